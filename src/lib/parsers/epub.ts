import JSZip from "jszip";
import { posix } from "node:path";
import { isText } from "domhandler";
import type { Element } from "domhandler";
import type { ArchiveItem, ArchiveItemType, BookArchive, BookMetadata, SpineEntry } from "@/types";
import { ArchiveError } from "@/lib/errors";
import { parseXml } from "./markup";

const NCX_MEDIA_TYPE = "application/x-dtbncx+xml";
const DOCUMENT_MEDIA_TYPES = new Set(["application/xhtml+xml", "text/html"]);

/**
 * Read an EPUB container into its metadata, manifest and spine.
 * Text content is loaded for content documents and navigation documents only.
 */
export async function parseEPUB(buffer: Buffer | Uint8Array): Promise<BookArchive> {
    let zip: JSZip;
    try {
        zip = await JSZip.loadAsync(buffer);
    } catch (err) {
        throw new ArchiveError("Not a readable zip archive", { cause: err });
    }

    const containerFile = zip.file("META-INF/container.xml");
    if (!containerFile) {
        throw new ArchiveError("Missing META-INF/container.xml");
    }

    const container = parseXml(await containerFile.async("string"));
    const opfPath = elementsNamed(container.root().find("*").get(), "rootfile")
        .map((el) => el.attribs["full-path"])
        .find(Boolean);
    if (!opfPath) {
        throw new ArchiveError("container.xml does not name a package document");
    }

    const opfFile = zip.file(opfPath);
    if (!opfFile) {
        throw new ArchiveError(`Package document not found: ${opfPath}`);
    }

    const opf = parseXml(await opfFile.async("string"));
    const elements = opf.root().find("*").get();
    const opfDir = posix.dirname(opfPath);

    const metadata: BookMetadata = {
        title: firstText(elements, "title"),
        author: firstText(elements, "creator"),
        language: firstText(elements, "language"),
    };

    const spineElement = elementsNamed(elements, "spine")[0];
    const ncxId = spineElement?.attribs["toc"];

    const items = new Map<string, ArchiveItem>();
    for (const el of elementsNamed(elements, "item")) {
        const id = el.attribs["id"];
        const rawHref = el.attribs["href"];
        if (!id || !rawHref) continue;

        const href = resolveHref(opfDir, rawHref);
        const mediaType = (el.attribs["media-type"] || "").toLowerCase();
        const properties = (el.attribs["properties"] || "").split(/\s+/).filter(Boolean);
        const type = id === ncxId ? "navigation" : classifyItem(mediaType, properties);

        const item: ArchiveItem = {
            id,
            href,
            fileName: posix.basename(href),
            mediaType,
            type,
            properties,
        };

        if (type === "document" || type === "navigation") {
            const file = zip.file(href);
            if (file) {
                item.content = await file.async("string");
            } else {
                console.warn(`⚠️ Manifest item ${id} points at a missing file: ${href}`);
            }
        }

        items.set(id, item);
    }

    const spine: SpineEntry[] = elementsNamed(elements, "itemref")
        .filter((el) => Boolean(el.attribs["idref"]))
        .map((el) => ({
            itemId: el.attribs["idref"],
            linear: el.attribs["linear"] !== "no",
        }));

    return { metadata, spine, items };
}

/**
 * Map a manifest entry onto the item types the segmenter cares about.
 * An EPUB 3 nav page is still a document: it keeps its place in the reading order.
 */
export function classifyItem(mediaType: string, properties: string[]): ArchiveItemType {
    if (mediaType === NCX_MEDIA_TYPE) return "navigation";
    if (DOCUMENT_MEDIA_TYPES.has(mediaType)) return "document";
    if (properties.includes("nav")) return "navigation";
    if (mediaType.startsWith("image/")) return "image";
    if (mediaType === "text/css") return "style";
    return "other";
}

function resolveHref(baseDir: string, href: string): string {
    let decoded = href;
    try {
        decoded = decodeURIComponent(href);
    } catch {
        // Malformed escapes are kept as written
    }
    return posix.normalize(posix.join(baseDir, decoded)).replace(/^\.\//, "");
}

// ─── OPF helpers ───
// Package documents use prefixed and unprefixed names interchangeably (dc:title, opf:item),
// so elements are matched on their local name.

function localName(tagName: string): string {
    const colon = tagName.indexOf(":");
    return (colon === -1 ? tagName : tagName.slice(colon + 1)).toLowerCase();
}

function elementsNamed(elements: Element[], name: string): Element[] {
    return elements.filter((el) => localName(el.name) === name);
}

function firstText(elements: Element[], name: string): string | undefined {
    for (const el of elementsNamed(elements, name)) {
        const text = textOf(el);
        if (text) return text;
    }
    return undefined;
}

function textOf(el: Element): string {
    let text = "";
    for (const child of el.children) {
        if (isText(child)) text += child.data;
    }
    return text.trim();
}
