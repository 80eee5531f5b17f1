import { Queue } from "bullmq";
import type { Job } from "bullmq";
import { loadConfig } from "@/lib/config";
import { createRedisConnection } from "@/lib/redis";

export const EXTRACTION_QUEUE = "epub-extraction";

// ─── Job Types ───

export interface ExtractionJobData {
    epubPath: string;
    outputRoot: string;
}

let _queue: Queue<ExtractionJobData> | null = null;

/**
 * Lazy-initialize the BullMQ queue so that importing this module
 * never opens a Redis connection on its own.
 */
function getQueue(): Queue<ExtractionJobData> {
    if (!_queue) {
        _queue = new Queue<ExtractionJobData>(EXTRACTION_QUEUE, {
            connection: createRedisConnection(loadConfig().redisUrl),
            defaultJobOptions: {
                attempts: 3,
                backoff: {
                    type: "exponential",
                    delay: 2000,
                },
                removeOnComplete: {
                    count: 100,
                    age: 24 * 3600, // 24 hours
                },
                removeOnFail: {
                    count: 50,
                },
            },
        });
    }
    return _queue;
}

// ─── Queue Helpers ───

export function extractionJobId(epubPath: string): string {
    return `extract-${Buffer.from(epubPath).toString("base64url")}`;
}

export async function queueExtraction(data: ExtractionJobData): Promise<Job<ExtractionJobData>> {
    return getQueue().add("extract", data, {
        jobId: extractionJobId(data.epubPath),
    });
}

export async function closeQueue(): Promise<void> {
    if (_queue) {
        await _queue.close();
        _queue = null;
    }
}
