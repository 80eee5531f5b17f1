import { Worker } from "bullmq";
import type { BookExtractionReport } from "@/types";
import { loadConfig } from "@/lib/config";
import { errorMessage } from "@/lib/errors";
import { EXTRACTION_QUEUE } from "@/lib/queue";
import type { ExtractionJobData } from "@/lib/queue";
import { createRedisConnection } from "@/lib/redis";
import { processEpubFile } from "./bookProcessor";

/**
 * BullMQ worker that runs queued extraction jobs, one book per job.
 * Books never share an output directory, so jobs can run side by side.
 */
export function startExtractionWorker(): Worker<ExtractionJobData, BookExtractionReport> {
    const config = loadConfig();

    const worker = new Worker<ExtractionJobData, BookExtractionReport>(
        EXTRACTION_QUEUE,
        async (job) => {
            const { epubPath, outputRoot } = job.data;
            console.log(`🔄 Starting extraction job ${job.id} for ${epubPath}`);

            try {
                return await processEpubFile(epubPath, outputRoot);
            } catch (error) {
                console.error(`❌ Extraction failed for ${epubPath}:`, errorMessage(error));
                throw error;
            }
        },
        {
            connection: createRedisConnection(config.redisUrl),
            concurrency: config.concurrency,
        },
    );

    worker.on("failed", (job, err) => {
        console.error(`Job ${job?.id} failed:`, err.message);
    });

    worker.on("completed", (job, report) => {
        console.log(`✅ Job ${job.id} wrote ${report.chapters.length} chapters to ${report.outputDir}`);
    });

    return worker;
}
