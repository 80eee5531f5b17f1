import path from "node:path";
import { PathTooLongError } from "@/lib/errors";
import { codePointLength } from "@/lib/utils/text";

export const DEFAULT_MAX_TITLE_LENGTH = 100;
export const MAX_PATH_LENGTH = 255;
export const CHAPTER_EXTENSION = ".txt";
export const AGGREGATE_FILE_NAME = "000_non_chapter_content.txt";

const ALPHANUMERIC = /^[\p{L}\p{N}]$/u;

/**
 * Replace every code point that is not a letter or number with `_` (one for one),
 * then cut to `maxLength` code points. Trailing underscores are dropped only when
 * the title was cut.
 */
export function sanitizeFilename(title: string, maxLength = DEFAULT_MAX_TITLE_LENGTH): string {
    const chars = Array.from(title, (char) => (ALPHANUMERIC.test(char) ? char : "_"));
    if (chars.length <= maxLength) return chars.join("");

    return chars.slice(0, Math.max(0, maxLength)).join("").replace(/_+$/, "");
}

export function sequencePrefix(sequence: number): string {
    return `${String(sequence).padStart(3, "0")}_`;
}

export function chapterFileName(sequence: number, title: string, maxLength = DEFAULT_MAX_TITLE_LENGTH): string {
    return `${sequencePrefix(sequence)}${sanitizeFilename(title, maxLength)}${CHAPTER_EXTENSION}`;
}

/**
 * File name for a chapter inside `outputDir`. When the full path is over the limit the
 * title gets one shorter allowance; a path that is still too long is an error.
 * Lengths are in code points.
 */
export function resolveChapterFileName(outputDir: string, sequence: number, title: string): string {
    const fileName = chapterFileName(sequence, title);
    if (codePointLength(path.join(outputDir, fileName)) <= MAX_PATH_LENGTH) return fileName;

    const allowance = DEFAULT_MAX_TITLE_LENGTH - (sequencePrefix(sequence).length + CHAPTER_EXTENSION.length);
    const shortened = chapterFileName(sequence, title, allowance);
    const fullPath = path.join(outputDir, shortened);
    if (codePointLength(fullPath) > MAX_PATH_LENGTH) {
        throw new PathTooLongError(fullPath, MAX_PATH_LENGTH);
    }
    return shortened;
}
