import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";
import { hasChildren, isTag, isText } from "domhandler";
import type { AnyNode, Element } from "domhandler";

const SKIPPED_TAGS = new Set(["script", "style"]);

/**
 * Parse XHTML/HTML content documents with htmlparser2.
 * EPUB documents are XHTML, so self-closing tags (`<title/>`, `<br/>`) must be honoured,
 * but tag names are lower-cased so queries behave as they would on HTML.
 */
export function parseMarkup(markup: string): CheerioAPI {
    return cheerio.load(markup, {
        xml: {
            xmlMode: false,
            decodeEntities: true,
            lowerCaseTags: true,
            lowerCaseAttributeNames: true,
            recognizeSelfClosing: true,
        },
    });
}

/** Parse package, container and NCX files, where tag names are case-sensitive. */
export function parseXml(markup: string): CheerioAPI {
    return cheerio.load(markup, { xml: true });
}

function collectText(nodes: AnyNode[], out: string[]): void {
    for (const node of nodes) {
        if (isText(node)) {
            out.push(node.data);
        } else if (isTag(node)) {
            if (!SKIPPED_TAGS.has(node.name)) collectText(node.children, out);
        } else if (hasChildren(node)) {
            collectText(node.children, out);
        }
    }
}

/**
 * Plain text of the document body (the whole document when there is no body):
 * text nodes joined by a space, whitespace runs collapsed.
 */
export function extractText(doc: CheerioAPI): string {
    const body = doc("body").first();
    const roots: AnyNode[] = body.length > 0 ? body.get() : doc.root().get();

    const parts: string[] = [];
    collectText(roots, parts);
    return parts.join(" ").replace(/\s+/g, " ").trim();
}

/** Text of a single element: each text node trimmed, empty ones dropped, no separator. */
export function elementText(element: Element): string {
    const parts: string[] = [];
    collectText([element], parts);
    return parts
        .map((part) => part.trim())
        .filter(Boolean)
        .join("");
}

/** The document's own `<title>`, if it has a non-empty one. */
export function documentTitle(doc: CheerioAPI): string | undefined {
    const title = doc("head title").first();
    const text = title.length > 0 ? title.text().trim() : "";
    return text || undefined;
}
