import type { ContentClass } from "@/types";
import { codePointLength } from "@/lib/utils/text";

/** Text at or below this length is front/back matter (cover, copyright, dedication). */
export const MIN_CHAPTER_LENGTH = 100;

export function classifyContent(text: string, minLength = MIN_CHAPTER_LENGTH): ContentClass {
    return codePointLength(text.trim()) > minLength ? "chapter" : "fragment";
}
