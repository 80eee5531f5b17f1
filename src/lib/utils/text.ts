/** Length in code points, so astral characters count once. */
export function codePointLength(text: string): number {
    return Array.from(text).length;
}
