import fs from "fs/promises";
import path from "path";
import type { BookArchive, BookResult } from "@/types";
import { ExtractionTimeoutError, errorMessage } from "@/lib/errors";
import { bookDirectoryName } from "@/lib/segmentation/driver";
import { withLimit, withTimeout } from "@/lib/utils/withLimit";
import { processEpubFile } from "@/workers/bookProcessor";

export interface BatchOptions {
    concurrency: number;
    timeoutMs: number;
}

export async function listEpubFiles(inputDir: string): Promise<string[]> {
    const entries = await fs.readdir(inputDir, { withFileTypes: true });
    return entries
        .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith(".epub"))
        .map((entry) => entry.name)
        .sort()
        .map((name) => path.join(inputDir, name));
}

/**
 * Hands out one output directory per book for a batch run. Two books whose titles
 * sanitize to the same name get `_2`, `_3`, ... so neither overwrites the other.
 */
export function createDirectoryClaims(): (archive: BookArchive) => string {
    const claimed = new Set<string>();

    return (archive) => {
        const base = bookDirectoryName(archive.metadata.title);
        let name = base;
        for (let n = 2; claimed.has(name); n++) {
            name = `${base}_${n}`;
        }
        claimed.add(name);
        return name;
    };
}

/**
 * Extract every `*.epub` in `inputDir`. A failing or hanging book is reported and
 * the rest of the batch carries on.
 */
export async function extractAll(
    inputDir: string,
    outputRoot: string,
    { concurrency, timeoutMs }: BatchOptions
): Promise<BookResult[]> {
    const files = await listEpubFiles(inputDir);
    await fs.mkdir(outputRoot, { recursive: true });

    const claimDirectory = createDirectoryClaims();
    const tasks = files.map((file) => async (): Promise<BookResult> => {
        try {
            const report = await withTimeout(
                processEpubFile(file, outputRoot, { claimDirectory }),
                timeoutMs,
                () => new ExtractionTimeoutError(file, timeoutMs)
            );
            return { file, status: "success", report };
        } catch (err) {
            console.error(`❌ '${path.basename(file)}' failed:`, errorMessage(err));
            return { file, status: "failed", error: errorMessage(err) };
        }
    });

    const results = await withLimit(concurrency, tasks);
    console.log("Processing complete.");
    return results;
}
