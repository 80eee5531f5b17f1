import fs from "fs/promises";
import path from "path";
import type {
    AggregateFragment,
    ArchiveItem,
    BookArchive,
    BookExtractionReport,
    ChapterRecord,
    DocumentFragment,
    NavigationIndex,
    SegmentationPhase,
    WrittenFile,
} from "@/types";
import { errorMessage } from "@/lib/errors";
import { documentTitle, extractText, parseMarkup } from "@/lib/parsers/markup";
import { classifyContent } from "./classifier";
import { AGGREGATE_FILE_NAME, resolveChapterFileName, sanitizeFilename } from "./filename";
import { buildNavigationIndex } from "./navigation";
import { resolveFragmentTitle } from "./title";

export const UNKNOWN_BOOK = "Unknown_Book";

const AGGREGATE_SEPARATOR = "\n\n";
const AGGREGATE_TITLE = "Non-chapter content";

// ─── Book-scoped state ───

export interface SegmentationState {
    phase: SegmentationPhase;
    nextSequence: number;
    aggregate: AggregateFragment;
}

export type FragmentOutcome =
    | { kind: "chapter"; chapter: ChapterRecord }
    | { kind: "fragment" }
    | { kind: "empty" };

export interface SegmentationStep {
    state: SegmentationState;
    outcome: FragmentOutcome;
}

const NEXT_PHASE: Record<SegmentationPhase, SegmentationPhase | undefined> = {
    "initializing": "building-nav-index",
    "building-nav-index": "iterating-fragments",
    "iterating-fragments": "finalizing",
    "finalizing": "done",
    "done": undefined,
};

export function initialState(): SegmentationState {
    return {
        phase: "initializing",
        nextSequence: 1,
        aggregate: { sequence: 0, text: "" },
    };
}

export function advance(state: SegmentationState, to: SegmentationPhase): SegmentationState {
    if (NEXT_PHASE[state.phase] !== to) {
        throw new Error(`Invalid segmentation transition: ${state.phase} → ${to}`);
    }
    return { ...state, phase: to };
}

/**
 * Classify one fragment. Chapters take the next sequence number; everything shorter is
 * appended to the aggregate without touching the counter.
 */
export function segmentFragment(
    state: SegmentationState,
    fragment: DocumentFragment,
    navigation: NavigationIndex
): SegmentationStep {
    if (state.phase !== "iterating-fragments") {
        throw new Error(`Cannot segment fragments while ${state.phase}`);
    }

    const text = extractText(fragment.doc);
    if (!text) return { state, outcome: { kind: "empty" } };

    if (classifyContent(text) === "fragment") {
        return {
            state: {
                ...state,
                aggregate: { sequence: 0, text: state.aggregate.text + text + AGGREGATE_SEPARATOR },
            },
            outcome: { kind: "fragment" },
        };
    }

    const { title, source } = resolveFragmentTitle(fragment, navigation);
    const chapter: ChapterRecord = { sequence: state.nextSequence, title, titleSource: source, text };
    return {
        state: { ...state, nextSequence: state.nextSequence + 1 },
        outcome: { kind: "chapter", chapter },
    };
}

// ─── Fragments ───

export function bookDirectoryName(title: string | undefined): string {
    return sanitizeFilename(title || UNKNOWN_BOOK);
}

/** Content documents with markup become fragments; anything else is skipped. */
export function toFragment(item: ArchiveItem | undefined, position: number): DocumentFragment | undefined {
    if (!item || item.type !== "document" || !item.content?.trim()) return undefined;

    const doc = parseMarkup(item.content);
    return {
        id: item.id,
        position,
        sourceFileName: item.fileName,
        intrinsicTitle: documentTitle(doc),
        doc,
    };
}

// ─── Driver ───

export interface ExtractBookOptions {
    /** Overrides the directory derived from the book title */
    directoryName?: string;
}

/**
 * Segment one book and write its chapter files under `outputRoot`.
 * The first spine entry is treated as a navigation landing page and never emitted.
 */
export async function extractBook(
    archive: BookArchive,
    outputRoot: string,
    options: ExtractBookOptions = {}
): Promise<BookExtractionReport> {
    let state = initialState();

    const title = archive.metadata.title || UNKNOWN_BOOK;
    const outputDir = path.join(outputRoot, options.directoryName ?? bookDirectoryName(title));
    await fs.mkdir(outputDir, { recursive: true });

    const report: BookExtractionReport = {
        title,
        outputDir,
        chapters: [],
        failures: [],
        skippedFragments: 0,
    };

    state = advance(state, "building-nav-index");
    const navigation = buildNavigationIndex(archive.items.values());

    state = advance(state, "iterating-fragments");
    for (const [position, entry] of archive.spine.entries()) {
        if (position === 0) continue;

        const fragment = toFragment(archive.items.get(entry.itemId), position);
        if (!fragment) {
            report.skippedFragments++;
            continue;
        }

        const step = segmentFragment(state, fragment, navigation);
        state = step.state;

        if (step.outcome.kind === "empty") {
            report.skippedFragments++;
        } else if (step.outcome.kind === "chapter") {
            const { chapter } = step.outcome;
            try {
                const fileName = resolveChapterFileName(outputDir, chapter.sequence, chapter.title);
                report.chapters.push(await writeText(outputDir, fileName, chapter.sequence, chapter.title, chapter.text));
            } catch (err) {
                console.error(`❌ Chapter ${chapter.sequence} of "${title}" not written:`, errorMessage(err));
                report.failures.push({ sequence: chapter.sequence, title: chapter.title, error: errorMessage(err) });
            }
        }
    }

    state = advance(state, "finalizing");
    if (state.aggregate.text.trim()) {
        try {
            report.aggregate = await writeText(outputDir, AGGREGATE_FILE_NAME, 0, AGGREGATE_TITLE, state.aggregate.text);
        } catch (err) {
            console.error(`❌ Non-chapter content of "${title}" not written:`, errorMessage(err));
            report.failures.push({ sequence: 0, title: AGGREGATE_TITLE, error: errorMessage(err) });
        }
    }

    state = advance(state, "done");
    return report;
}

async function writeText(
    outputDir: string,
    fileName: string,
    sequence: number,
    title: string,
    text: string
): Promise<WrittenFile> {
    const filePath = path.join(outputDir, fileName);
    await fs.writeFile(filePath, text, "utf8");
    return { sequence, title, fileName, path: filePath };
}
