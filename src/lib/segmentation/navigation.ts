import type { CheerioAPI } from "cheerio";
import { isTag } from "domhandler";
import type { ArchiveItem, NavigationIndex } from "@/types";
import { errorMessage } from "@/lib/errors";
import { parseMarkup, parseXml } from "@/lib/parsers/markup";

interface NavigationEntry {
    source: string;
    label: string;
}

/**
 * Build the content-file → label map from the book's navigation documents (NCX and
 * EPUB 3 nav). Entries are applied in document order, so when two entries point at the
 * same file the later one wins.
 */
export function buildNavigationIndex(items: Iterable<ArchiveItem>): NavigationIndex {
    const index: NavigationIndex = new Map();

    for (const item of items) {
        if (!isNavigationSource(item) || !item.content) continue;

        let entries: NavigationEntry[];
        try {
            const xml = parseXml(item.content);
            entries = isNcx(xml) ? ncxEntries(xml) : navDocumentEntries(parseMarkup(item.content));
        } catch (err) {
            console.warn(`⚠️ Skipping unreadable navigation document ${item.href}:`, errorMessage(err));
            continue;
        }

        for (const { source, label } of entries) {
            const key = navigationKey(source);
            if (key && label) index.set(key, label);
        }
    }

    return index;
}

/** `Text/chapter1.xhtml#start` → `chapter1.xhtml` */
export function navigationKey(source: string): string {
    const withoutAnchor = source.split("#")[0];
    const fileName = withoutAnchor.split("/").pop() ?? "";
    try {
        return decodeURIComponent(fileName);
    } catch {
        return fileName;
    }
}

function isNavigationSource(item: ArchiveItem): boolean {
    return item.type === "navigation" || item.properties.includes("nav");
}

// Some books declare their NCX as text/xml or application/xml; the root element decides.
function isNcx($: CheerioAPI): boolean {
    return $.root()
        .children()
        .toArray()
        .some((el) => el.name === "ncx");
}

function ncxEntries($: CheerioAPI): NavigationEntry[] {
    return $.root()
        .find("*")
        .toArray()
        .filter((el) => el.name === "navPoint")
        .map((navPoint) => {
            const children = navPoint.children.filter(isTag);
            const navLabel = children.find((child) => child.name === "navLabel");
            const text = navLabel?.children.filter(isTag).find((child) => child.name === "text");
            const content = children.find((child) => child.name === "content");
            return {
                source: content?.attribs["src"] ?? "",
                label: text ? collapse($(text).text()) : "",
            };
        });
}

function navDocumentEntries($: CheerioAPI): NavigationEntry[] {
    return $("nav a[href]")
        .toArray()
        .map((anchor) => ({
            source: anchor.attribs["href"] ?? "",
            label: collapse($(anchor).text()),
        }));
}

function collapse(text: string): string {
    return text.replace(/\s+/g, " ").trim();
}
