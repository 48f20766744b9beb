export type OutputLineKind = 'empty' | 'noise' | 'progress' | 'text';

// One spinner frame, possibly repeated or padded: "-", " \ ", "|"
const SPINNER_FRAME = /^[\s\-\\|/]+$/;

// Progress bar drawn from block glyphs with an optional percentage: "███▒▒▒  42%"
const BAR_FRAME = /^(?=.*[\u2580-\u259f])[\s\u2580-\u259f\d.%]+$/;

// "1.50 MB / 20.3 MB", "512 KB / 2.00 MB"
const BYTE_PROGRESS = /\d+(?:\.\d+)?\s*(?:B|KB|MB|GB|TB)\s*\/\s*\d+(?:\.\d+)?\s*(?:B|KB|MB|GB|TB)\b/i;

/**
 * Classify one line of installer output. Spinner and bar frames are noise;
 * a line reporting transferred bytes is progress.
 */
export function classifyOutputLine(line: string): OutputLineKind {
    if (line.trim() === '') return 'empty';
    if (BYTE_PROGRESS.test(line)) return 'progress';
    if (SPINNER_FRAME.test(line) || BAR_FRAME.test(line)) return 'noise';
    return 'text';
}

