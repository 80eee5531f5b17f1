/** The EPUB container could not be read (not a zip, missing package document, ...). */
export class ArchiveError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "ArchiveError";
    }
}

/** A chapter file name still exceeds the path limit after the shortened retry. */
export class PathTooLongError extends Error {
    constructor(
        readonly path: string,
        readonly limit: number
    ) {
        super(`Output path exceeds ${limit} characters (${Array.from(path).length}): ${path}`);
        this.name = "PathTooLongError";
    }
}

export class ExtractionTimeoutError extends Error {
    constructor(
        readonly file: string,
        readonly timeoutMs: number
    ) {
        super(`Extraction of ${file} timed out after ${timeoutMs}ms`);
        this.name = "ExtractionTimeoutError";
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
