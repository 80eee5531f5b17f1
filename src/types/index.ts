// ═══════════════════════════════════════
// epub-chapters — Type Definitions
// ═══════════════════════════════════════

import type { CheerioAPI } from "cheerio";

// ─── Archive ───

export type ArchiveItemType = "document" | "navigation" | "image" | "style" | "other";

export interface ArchiveItem {
    id: string;
    /** Path inside the zip, resolved against the package document's directory */
    href: string;
    /** Last path segment of `href` */
    fileName: string;
    mediaType: string;
    type: ArchiveItemType;
    properties: string[];
    /** Decoded text, loaded for document and navigation items only */
    content?: string;
}

export interface SpineEntry {
    itemId: string;
    linear: boolean;
}

export interface BookMetadata {
    title?: string;
    author?: string;
    language?: string;
}

export interface BookArchive {
    metadata: BookMetadata;
    spine: SpineEntry[];
    items: Map<string, ArchiveItem>;
}

// ─── Segmentation ───

export interface DocumentFragment {
    id: string;
    /** 0-based index in the spine */
    position: number;
    sourceFileName: string;
    intrinsicTitle?: string;
    doc: CheerioAPI;
}

/** Content-source file name → navigation label */
export type NavigationIndex = Map<string, string>;

export type TitleSource =
    | "heading"
    | "title-class"
    | "emphasis"
    | "navigation"
    | "intrinsic"
    | "placeholder";

export interface ResolvedTitle {
    title: string;
    source: TitleSource;
}

export type ContentClass = "chapter" | "fragment";

export interface ChapterRecord {
    sequence: number;
    title: string;
    titleSource: TitleSource;
    text: string;
}

export interface AggregateFragment {
    sequence: 0;
    text: string;
}

export type SegmentationPhase =
    | "initializing"
    | "building-nav-index"
    | "iterating-fragments"
    | "finalizing"
    | "done";

// ─── Reports ───

export interface WrittenFile {
    sequence: number;
    title: string;
    fileName: string;
    path: string;
}

export interface FileFailure {
    sequence: number;
    title: string;
    error: string;
}

export interface BookExtractionReport {
    title: string;
    outputDir: string;
    chapters: WrittenFile[];
    aggregate?: WrittenFile;
    failures: FileFailure[];
    skippedFragments: number;
}

export type BookResult =
    | { file: string; status: "success"; report: BookExtractionReport }
    | { file: string; status: "failed"; error: string };
