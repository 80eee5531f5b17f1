import { readFile } from "fs/promises";
import path from "path";
import type { BookArchive, BookExtractionReport } from "@/types";
import { ArchiveError } from "@/lib/errors";
import { parseEPUB } from "@/lib/parsers/epub";
import { extractBook } from "@/lib/segmentation/driver";
import { validateEpubFile } from "@/lib/validators/file";

export interface ProcessOptions {
    /**
     * Called once the archive is parsed, before anything is written.
     * Returns the directory name the book should be written to.
     */
    claimDirectory?: (archive: BookArchive) => string;
}

/**
 * Process one EPUB: read, validate, parse, segment and write its chapter files.
 * Archive-level failures are thrown to the caller; nothing is written for that book.
 */
export async function processEpubFile(
    epubPath: string,
    outputRoot: string,
    options: ProcessOptions = {}
): Promise<BookExtractionReport> {
    const name = path.basename(epubPath);
    console.log(`📖 Processing '${name}'...`);

    const buffer = await readFile(epubPath);
    const validation = validateEpubFile(buffer, name);
    if (!validation.valid) {
        throw new ArchiveError(`${name}: ${validation.error}`);
    }

    const archive = await parseEPUB(buffer);
    const directoryName = options.claimDirectory?.(archive);
    const report = await extractBook(archive, outputRoot, { directoryName });

    const aggregate = report.aggregate ? " + non-chapter content" : "";
    console.log(`✅ '${name}' → ${report.outputDir}: ${report.chapters.length} chapters${aggregate}`);
    if (report.failures.length > 0) {
        console.warn(`⚠️ '${name}': ${report.failures.length} file(s) could not be written`);
    }

    return report;
}
