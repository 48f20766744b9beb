// Truncation ellipsis, guillemets, box drawing, block elements, zero-width space, BOM
const DECORATIVE_GLYPHS = /[\u2026\u00ab\u00bb\u2500-\u259f\u200b\ufeff]/g;

const SEPARATOR_LINE = /^\s*-+\s*$/;

/**
 * Strip decorative glyphs and collapse whitespace runs to single spaces
 */
export function cleanText(text: string): string {
    return text.replace(DECORATIVE_GLYPHS, '').replace(/\s+/g, ' ').trim();
}

/**
 * Split console output into lines the way a terminal would show them: a bare
 * carriage return rewinds the cursor, so only the text after the last `\r` of a
 * line is visible.
 */
export function splitTerminalLines(output: string): string[] {
    return output.split(/\r?\n/).map((line) => {
        const lastReturn = line.lastIndexOf('\r');
        return lastReturn === -1 ? line : line.slice(lastReturn + 1);
    });
}

export function isBlankLine(line: string): boolean {
    return cleanText(line) === '';
}

export function isSeparatorLine(line: string): boolean {
    return SEPARATOR_LINE.test(line);
}

/**
 * Slice a line at column start offsets; the last column runs to the end of the line
 */
export function parseFixedWidthLine(line: string, offsets: readonly number[]): string[] {
    return offsets.map((start, i) => {
        const end = i < offsets.length - 1 ? offsets[i + 1] : line.length;
        return cleanText(line.slice(start, end));
    });
}
