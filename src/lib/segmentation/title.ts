import type { CheerioAPI } from "cheerio";
import { isTag } from "domhandler";
import type { Element } from "domhandler";
import type { DocumentFragment, NavigationIndex, ResolvedTitle } from "@/types";
import { elementText } from "@/lib/parsers/markup";
import { codePointLength } from "@/lib/utils/text";

export const UNTITLED = "Untitled";

const HEADING_SELECTOR = "h1, h2, h3, h4";

/** Checked in this order; the first selector with a match wins. */
const TITLE_CLASS_SELECTORS = ["p.title", "div.chapter-title", "span.chapter-title"];

/** Shorter emphasis runs are inline abbreviations ("e.g.", "ibid"). */
const MIN_EMPHASIS_TITLE_LENGTH = 5;

const TITLE_CONTAINER_TAGS = new Set(["h1", "h2", "h3", "div", "header", "title", "nav"]);

export interface TitleContext {
    doc: CheerioAPI;
    sourceFileName: string;
    intrinsicTitle?: string;
    navigation: NavigationIndex;
}

export type TitleStrategy = (context: TitleContext) => ResolvedTitle | undefined;

// ─── Emphasis heuristic ───

export interface EmphasisFacts {
    textLength: number;
    /** Lower-cased tag name of the parent, undefined at document level */
    parentTag?: string;
    isFirstChild: boolean;
}

export function isLikelyTitle({ textLength, parentTag, isFirstChild }: EmphasisFacts): boolean {
    if (textLength <= MIN_EMPHASIS_TITLE_LENGTH) return false;
    if (parentTag !== undefined && TITLE_CONTAINER_TAGS.has(parentTag)) return true;
    return isFirstChild;
}

export function emphasisFacts(element: Element): EmphasisFacts {
    const parent = element.parent;
    return {
        textLength: codePointLength(elementText(element)),
        parentTag: parent && isTag(parent) ? parent.name : undefined,
        isFirstChild: parent ? parent.children[0] === element : false,
    };
}

// ─── Strategies ───

const fromHeading: TitleStrategy = ({ doc }) => {
    const heading = doc(HEADING_SELECTOR).get(0);
    return heading ? { title: elementText(heading), source: "heading" } : undefined;
};

const fromTitleClass: TitleStrategy = ({ doc }) => {
    for (const selector of TITLE_CLASS_SELECTORS) {
        const element = doc<Element, string>(selector).get(0);
        if (element) return { title: elementText(element), source: "title-class" };
    }
    return undefined;
};

const fromEmphasis: TitleStrategy = ({ doc }) => {
    const match = doc("em")
        .toArray()
        .find((em) => isLikelyTitle(emphasisFacts(em)));
    return match ? { title: elementText(match), source: "emphasis" } : undefined;
};

const fromNavigation: TitleStrategy = ({ navigation, sourceFileName }) => {
    const label = navigation.get(sourceFileName);
    return label !== undefined ? { title: label, source: "navigation" } : undefined;
};

const fromIntrinsic: TitleStrategy = ({ intrinsicTitle }) =>
    intrinsicTitle ? { title: intrinsicTitle, source: "intrinsic" } : undefined;

/** Run strategies in order and keep the first one that produces a title. */
export function firstMatch(strategies: TitleStrategy[]): TitleStrategy {
    return (context) => {
        for (const strategy of strategies) {
            const result = strategy(context);
            if (result) return result;
        }
        return undefined;
    };
}

/**
 * Markup found in the body always beats the navigation label and the document's own
 * title, so the body strategies come first.
 */
export const TITLE_STRATEGIES: readonly TitleStrategy[] = [
    fromHeading,
    fromTitleClass,
    fromEmphasis,
    fromNavigation,
    fromIntrinsic,
];

const cascade = firstMatch([...TITLE_STRATEGIES]);

export function resolveTitle(context: TitleContext): ResolvedTitle {
    return cascade(context) ?? { title: UNTITLED, source: "placeholder" };
}

export function resolveFragmentTitle(fragment: DocumentFragment, navigation: NavigationIndex): ResolvedTitle {
    return resolveTitle({
        doc: fragment.doc,
        sourceFileName: fragment.sourceFileName,
        intrinsicTitle: fragment.intrinsicTitle,
        navigation,
    });
}
