import { describe, expect, it } from "vitest";
import { classifyContent, MIN_CHAPTER_LENGTH } from "./classifier";

describe("classifyContent", () => {
    it("treats text of exactly the threshold as a fragment", () => {
        expect(MIN_CHAPTER_LENGTH).toBe(100);
        expect(classifyContent("a".repeat(100))).toBe("fragment");
    });

    it("treats text one past the threshold as a chapter", () => {
        expect(classifyContent("a".repeat(101))).toBe("chapter");
    });

    it("measures the trimmed text", () => {
        expect(classifyContent(`   ${"a".repeat(100)}\n\n`)).toBe("fragment");
    });

    it("classifies empty text as a fragment", () => {
        expect(classifyContent("")).toBe("fragment");
    });

    it("counts code points rather than UTF-16 units", () => {
        expect(classifyContent("😀".repeat(60))).toBe("fragment");
        expect(classifyContent("😀".repeat(101))).toBe("chapter");
    });

    it("accepts a custom threshold", () => {
        expect(classifyContent("short text", 5)).toBe("chapter");
    });
});
