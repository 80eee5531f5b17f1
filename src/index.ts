export * from "@/types";
export { ArchiveError, ExtractionTimeoutError, PathTooLongError } from "@/lib/errors";
export { parseEPUB, classifyItem } from "@/lib/parsers/epub";
export { parseMarkup, extractText } from "@/lib/parsers/markup";
export { buildNavigationIndex, navigationKey } from "@/lib/segmentation/navigation";
export { isLikelyTitle, resolveTitle, UNTITLED } from "@/lib/segmentation/title";
export { classifyContent, MIN_CHAPTER_LENGTH } from "@/lib/segmentation/classifier";
export {
    AGGREGATE_FILE_NAME,
    chapterFileName,
    resolveChapterFileName,
    sanitizeFilename,
} from "@/lib/segmentation/filename";
export { bookDirectoryName, extractBook, UNKNOWN_BOOK } from "@/lib/segmentation/driver";
export { extractAll, listEpubFiles } from "@/lib/batch";
export { processEpubFile } from "@/workers/bookProcessor";
