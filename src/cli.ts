import { Command, InvalidArgumentError } from "commander";
import { extractAll, listEpubFiles } from "@/lib/batch";
import { loadConfig, parsePositiveInt } from "@/lib/config";
import { closeQueue, queueExtraction } from "@/lib/queue";
import { startExtractionWorker } from "@/workers/extractionWorker";

function positiveInt(value: string): number {
    const parsed = parsePositiveInt(value);
    if (parsed === undefined) {
        throw new InvalidArgumentError("Expected a positive integer.");
    }
    return parsed;
}

const config = loadConfig();
const program = new Command();

program
    .name("epub-chapters")
    .description("Split EPUB archives into per-chapter plain-text files");

program
    .command("extract")
    .description("Extract every .epub in a directory")
    .argument("[input]", "directory containing .epub files", config.inputDir)
    .argument("[output]", "directory to write extracted text to", config.outputDir)
    .option("-c, --concurrency <n>", "books processed at once", positiveInt, config.concurrency)
    .option("-t, --timeout <ms>", "per-book timeout in milliseconds", positiveInt, config.timeoutMs)
    .action(async (input: string, output: string, opts: { concurrency: number; timeout: number }) => {
        const results = await extractAll(input, output, {
            concurrency: opts.concurrency,
            timeoutMs: opts.timeout,
        });

        const failed = results.filter((result) => result.status === "failed");
        console.log(`📚 ${results.length - failed.length}/${results.length} books extracted`);
        if (failed.length > 0) process.exitCode = 1;
    });

program
    .command("enqueue")
    .description("Queue every .epub in a directory for the extraction worker")
    .argument("[input]", "directory containing .epub files", config.inputDir)
    .argument("[output]", "directory to write extracted text to", config.outputDir)
    .action(async (input: string, output: string) => {
        try {
            const files = await listEpubFiles(input);
            for (const epubPath of files) {
                await queueExtraction({ epubPath, outputRoot: output });
            }
            console.log(`🔄 Queued ${files.length} books`);
        } finally {
            await closeQueue();
        }
    });

program
    .command("worker")
    .description("Run the extraction worker until interrupted")
    .action(() => {
        const worker = startExtractionWorker();
        const shutdown = () => {
            worker.close().then(
                () => process.exit(0),
                (err: unknown) => {
                    console.error("Worker shutdown failed:", err);
                    process.exit(1);
                }
            );
        };
        process.on("SIGINT", shutdown);
        process.on("SIGTERM", shutdown);
        console.log("👷 Extraction worker started");
    });

program.parseAsync().catch((err: unknown) => {
    console.error(err);
    process.exitCode = 1;
});
