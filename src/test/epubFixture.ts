import JSZip from "jszip";
import type { ArchiveItem, BookArchive } from "@/types";

export interface FixtureDocument {
    id: string;
    href: string;
    body: string;
    title?: string;
    mediaType?: string;
    properties?: string;
}

export interface FixtureBook {
    title?: string;
    author?: string;
    documents: FixtureDocument[];
    /** Spine order as item ids; defaults to every document in order */
    spine?: string[];
    /** NCX navPoints as [label, src] */
    toc?: Array<[string, string]>;
}

export function xhtml(body: string, title?: string): string {
    const head = title !== undefined ? `<head><title>${title}</title></head>` : "<head><title/></head>";
    return `<?xml version="1.0" encoding="utf-8"?>
<html xmlns="http://www.w3.org/1999/xhtml">${head}<body>${body}</body></html>`;
}

export function ncx(entries: Array<[string, string]>): string {
    const points = entries
        .map(([label, src], i) =>
            `<navPoint id="np${i + 1}" playOrder="${i + 1}"><navLabel><text>${label}</text></navLabel><content src="${src}"/></navPoint>`
        )
        .join("");
    return `<?xml version="1.0" encoding="UTF-8"?>
<ncx xmlns="http://www.daisy.org/z3986/2005/ncx/" version="2005-1"><navMap>${points}</navMap></ncx>`;
}

/** Zip a minimal EPUB 2 package with the package document under OEBPS/. */
export async function buildEpub(book: FixtureBook): Promise<Buffer> {
    const zip = new JSZip();
    zip.file("mimetype", "application/epub+zip");
    zip.file(
        "META-INF/container.xml",
        `<?xml version="1.0"?>
<container version="1.0" xmlns="urn:oasis:names:tc:opendocument:xmlns:container">
<rootfiles><rootfile full-path="OEBPS/content.opf" media-type="application/oebps-package+xml"/></rootfiles>
</container>`
    );

    const manifest = book.documents
        .map((doc) => {
            const properties = doc.properties ? ` properties="${doc.properties}"` : "";
            return `<item id="${doc.id}" href="${doc.href}" media-type="${doc.mediaType ?? "application/xhtml+xml"}"${properties}/>`;
        })
        .join("");
    const spine = (book.spine ?? book.documents.map((doc) => doc.id))
        .map((id) => `<itemref idref="${id}"/>`)
        .join("");
    const titleMeta = book.title !== undefined ? `<dc:title>${book.title}</dc:title>` : "";
    const authorMeta = book.author !== undefined ? `<dc:creator>${book.author}</dc:creator>` : "";
    const ncxItem = book.toc ? `<item id="ncx" href="toc.ncx" media-type="application/x-dtbncx+xml"/>` : "";

    zip.file(
        "OEBPS/content.opf",
        `<?xml version="1.0" encoding="UTF-8"?>
<package xmlns="http://www.idpf.org/2007/opf" version="2.0" unique-identifier="id">
<metadata xmlns:dc="http://purl.org/dc/elements/1.1/">${titleMeta}${authorMeta}<dc:language>en</dc:language></metadata>
<manifest>${manifest}${ncxItem}</manifest>
<spine${book.toc ? ' toc="ncx"' : ""}>${spine}</spine>
</package>`
    );

    for (const doc of book.documents) {
        zip.file(`OEBPS/${doc.href}`, xhtml(doc.body, doc.title));
    }
    if (book.toc) {
        zip.file("OEBPS/toc.ncx", ncx(book.toc));
    }

    return zip.generateAsync({ type: "nodebuffer" });
}

/** Build an archive directly, bypassing the zip layer. */
export function archiveOf(
    documents: Array<Pick<ArchiveItem, "id"> & Partial<ArchiveItem>>,
    metadataTitle?: string,
    spine: string[] = documents.filter((doc) => doc.type !== "navigation").map((doc) => doc.id)
): BookArchive {
    const items = new Map<string, ArchiveItem>();
    for (const doc of documents) {
        const href = doc.href ?? `${doc.id}.xhtml`;
        items.set(doc.id, {
            href,
            fileName: href.split("/").pop() ?? href,
            mediaType: "application/xhtml+xml",
            type: "document",
            properties: [],
            ...doc,
        });
    }
    return {
        metadata: { title: metadataTitle },
        spine: spine.map((itemId) => ({ itemId, linear: true })),
        items,
    };
}

/** Prose of exactly `length` characters, single-spaced, ending in a full stop. */
export function repeatText(length: number, unit = "Call me Ishmael. "): string {
    return unit.repeat(Math.ceil(length / unit.length)).slice(0, length - 1) + ".";
}
