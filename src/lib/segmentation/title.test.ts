import { describe, expect, it, vi } from "vitest";
import type { NavigationIndex } from "@/types";
import { parseMarkup } from "@/lib/parsers/markup";
import { xhtml } from "@/test/epubFixture";
import type { EmphasisFacts, TitleContext } from "./title";
import { emphasisFacts, firstMatch, isLikelyTitle, resolveTitle } from "./title";

function context(body: string, options: { navigation?: NavigationIndex; intrinsicTitle?: string } = {}): TitleContext {
    return {
        doc: parseMarkup(xhtml(body)),
        sourceFileName: "ch1.xhtml",
        intrinsicTitle: options.intrinsicTitle,
        navigation: options.navigation ?? new Map(),
    };
}

const navigation: NavigationIndex = new Map([["ch1.xhtml", "Nav Label"]]);

describe("isLikelyTitle", () => {
    const cases: Array<[EmphasisFacts, boolean]> = [
        [{ textLength: 5, parentTag: "h1", isFirstChild: true }, false],
        [{ textLength: 6, parentTag: "div", isFirstChild: false }, true],
        [{ textLength: 6, parentTag: "p", isFirstChild: false }, false],
        [{ textLength: 6, parentTag: "p", isFirstChild: true }, true],
        [{ textLength: 20, parentTag: "nav", isFirstChild: false }, true],
        [{ textLength: 20, parentTag: "header", isFirstChild: false }, true],
        [{ textLength: 20, parentTag: "title", isFirstChild: false }, true],
        [{ textLength: 20, parentTag: "h3", isFirstChild: false }, true],
        [{ textLength: 20, parentTag: "h4", isFirstChild: false }, false],
        [{ textLength: 20, parentTag: undefined, isFirstChild: true }, true],
        [{ textLength: 20, parentTag: undefined, isFirstChild: false }, false],
    ];

    it.each(cases)("%o → %s", (facts, expected) => {
        expect(isLikelyTitle(facts)).toBe(expected);
    });
});

describe("emphasisFacts", () => {
    it("reads length, parent tag and position from the tree", () => {
        const doc = parseMarkup(xhtml("<p>Said <em> The Whale </em></p>"));
        const em = doc("em").get(0);
        expect(em).toBeDefined();
        if (!em) return;

        expect(emphasisFacts(em)).toEqual({ textLength: 9, parentTag: "p", isFirstChild: false });
    });
});

describe("resolveTitle", () => {
    it("prefers a heading over the navigation label", () => {
        const result = resolveTitle(context("<h1>Chapter 1: Loomings</h1><p>Call me Ishmael.</p>", { navigation }));

        expect(result).toEqual({ title: "Chapter 1: Loomings", source: "heading" });
    });

    it("takes the first heading in document order", () => {
        expect(resolveTitle(context("<h3>Part One</h3><h1>Chapter 1</h1>")).title).toBe("Part One");
    });

    it("trims heading text", () => {
        expect(resolveTitle(context("<h2>\n   The Whale\n</h2>")).title).toBe("The Whale");
    });

    it("ignores headings below h4", () => {
        const result = resolveTitle(context("<h5>Small print</h5>", { intrinsicTitle: "Doc Title" }));

        expect(result).toEqual({ title: "Doc Title", source: "intrinsic" });
    });

    it("checks title classes in their fixed order", () => {
        const body =
            '<span class="chapter-title">Span Title</span>' +
            '<div class="chapter-title">Div Title</div>';
        expect(resolveTitle(context(body))).toEqual({ title: "Div Title", source: "title-class" });

        const withParagraph = body + '<p class="center title">Paragraph Title</p>';
        expect(resolveTitle(context(withParagraph)).title).toBe("Paragraph Title");
    });

    it("skips short emphasis and picks the first likely title", () => {
        const body = "<p>As in <em>e.g.</em> this</p><div><em>The Carpet-Bag</em> and more</div>";

        expect(resolveTitle(context(body, { navigation }))).toEqual({ title: "The Carpet-Bag", source: "emphasis" });
    });

    it("accepts emphasis that opens its paragraph", () => {
        const body = "<p><em>The Spouter-Inn</em> was the name of the place.</p>";

        expect(resolveTitle(context(body)).title).toBe("The Spouter-Inn");
    });

    it("rejects emphasis preceded by text inside a paragraph", () => {
        const body = "<p>Some words <em>an emphasized phrase</em></p><p> <em>Whitespace first</em></p>";

        expect(resolveTitle(context(body, { navigation }))).toEqual({ title: "Nav Label", source: "navigation" });
    });

    it("prefers the navigation label over the intrinsic title", () => {
        const result = resolveTitle(context("<p>Plain text only.</p>", { navigation, intrinsicTitle: "Doc Title" }));

        expect(result).toEqual({ title: "Nav Label", source: "navigation" });
    });

    it("falls back to the intrinsic title", () => {
        const result = resolveTitle(context("<p>Plain text only.</p>", { intrinsicTitle: "Doc Title" }));

        expect(result).toEqual({ title: "Doc Title", source: "intrinsic" });
    });

    it("falls back to a placeholder", () => {
        expect(resolveTitle(context("<p>Plain text only.</p>"))).toEqual({ title: "Untitled", source: "placeholder" });
        expect(resolveTitle(context("<p>Plain.</p>", { intrinsicTitle: "" })).source).toBe("placeholder");
    });
});

describe("firstMatch", () => {
    it("stops at the first strategy that returns a title", () => {
        const never = vi.fn(() => undefined);
        const hit = vi.fn(() => ({ title: "Found", source: "heading" as const }));
        const later = vi.fn(() => ({ title: "Later", source: "intrinsic" as const }));

        const result = firstMatch([never, hit, later])(context("<p/>"));

        expect(result).toEqual({ title: "Found", source: "heading" });
        expect(never).toHaveBeenCalledTimes(1);
        expect(later).not.toHaveBeenCalled();
    });

    it("returns undefined when nothing matches", () => {
        expect(firstMatch([() => undefined])(context("<p/>"))).toBeUndefined();
    });
});
