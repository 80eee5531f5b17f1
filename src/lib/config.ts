const DEFAULT_CONCURRENCY = 4;
const DEFAULT_TIMEOUT_MS = 120_000;

/** `undefined` unless `raw` is a whole number above zero. */
export function parsePositiveInt(raw: string): number | undefined {
    const value = Number(raw);
    return Number.isInteger(value) && value > 0 ? value : undefined;
}

function positiveInt(name: string, fallback: number): number {
    const raw = process.env[name];
    if (raw === undefined || raw === "") return fallback;

    const value = parsePositiveInt(raw);
    if (value === undefined) {
        console.warn(`⚠️ Ignoring ${name}=${raw}: expected a positive integer, using ${fallback}`);
        return fallback;
    }
    return value;
}

export interface ExtractorConfig {
    redisUrl: string;
    inputDir: string;
    outputDir: string;
    concurrency: number;
    timeoutMs: number;
}

export function loadConfig(): ExtractorConfig {
    return {
        redisUrl: process.env.REDIS_URL || "redis://localhost:6379",
        inputDir: process.env.EXTRACT_INPUT_DIR || "epub_files",
        outputDir: process.env.EXTRACT_OUTPUT_DIR || "extracted_text",
        concurrency: positiveInt("EXTRACT_CONCURRENCY", DEFAULT_CONCURRENCY),
        timeoutMs: positiveInt("EXTRACT_TIMEOUT_MS", DEFAULT_TIMEOUT_MS),
    };
}
