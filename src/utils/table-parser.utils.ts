import { ParseError } from '../exceptions/ParseError.js';
import { RowParseError } from '../exceptions/RowParseError.js';
import { DiagnosticSink } from '../interfaces/index.js';
import { isBlankLine, isSeparatorLine, parseFixedWidthLine } from './text.utils.js';

export type ColumnKey = 'name' | 'id' | 'version' | 'available' | 'source';

export const COLUMN_TITLES: Readonly<Record<ColumnKey, string>> = {
    name: 'Name',
    id: 'Id',
    version: 'Version',
    available: 'Available',
    source: 'Source',
};

export interface Column {
    key: ColumnKey;
    start: number;
}

export type RowValues = Record<ColumnKey, string>;

// "3 upgrades available." and "1 upgrade available." in the Name column
const SUMMARY_LINE = /\bupgrades? available\b/;

/**
 * Index of the first line, at or after `from`, that contains every title of `required`
 */
export function findHeaderIndex(lines: readonly string[], required: readonly ColumnKey[], from = 0): number {
    for (let i = from; i < lines.length; i++) {
        const line = lines[i];
        if (required.every((key) => line.includes(COLUMN_TITLES[key]))) {
            return i;
        }
    }
    return -1;
}

/**
 * Column layout of a header line. `Name` always starts at 0; every other
 * column starts where its title first appears. Optional columns are only
 * included when the header carries their title.
 */
export function locateColumns(header: string, required: readonly ColumnKey[], optional: readonly ColumnKey[] = []): Column[] {
    const columns: Column[] = [{ key: 'name', start: 0 }];

    for (const key of [...required, ...optional]) {
        if (key === 'name') continue;
        const start = header.indexOf(COLUMN_TITLES[key]);
        if (start === -1) {
            if (required.includes(key)) {
                throw new ParseError(`could not find header column "${COLUMN_TITLES[key]}"`);
            }
            continue;
        }
        columns.push({ key, start });
    }

    return columns.sort((a, b) => a.start - b.start);
}

export interface RowReaderOptions {
    columns: readonly Column[];
    required: readonly ColumnKey[];
    sink: DiagnosticSink;
}

/**
 * Slice one data line into named, cleaned values. Returns null for lines that
 * carry no package: separators, summaries, blank rows and rows missing a
 * required field. Nothing thrown while reading a row escapes.
 */
export function readRow(line: string, options: RowReaderOptions): RowValues | null {
    const { columns, required, sink } = options;

    if (isBlankLine(line) || isSeparatorLine(line)) return null;

    try {
        const sliced = parseFixedWidthLine(
            line,
            columns.map((column) => column.start)
        );
        const values: RowValues = { name: '', id: '', version: '', available: '', source: '' };
        columns.forEach((column, i) => {
            values[column.key] = sliced[i];
        });

        if (Object.values(values).every((value) => value === '')) {
            return null;
        }

        if (SUMMARY_LINE.test(values.name)) {
            sink.record({ level: 'debug', message: 'Skipping summary line', metadata: { line } });
            return null;
        }

        const missing = required.filter((key) => values[key] === '');
        if (missing.length > 0) {
            throw new RowParseError(`Row is missing ${missing.map((key) => COLUMN_TITLES[key]).join(', ')}`, line);
        }

        return values;
    } catch (error) {
        sink.record({
            level: 'warn',
            message: 'Skipping unparseable row',
            metadata: {
                line,
                error: error instanceof Error ? error.message : String(error),
            },
        });
        return null;
    }
}
