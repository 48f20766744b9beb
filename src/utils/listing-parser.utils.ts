import { ParseError } from '../exceptions/ParseError.js';
import {
    DiagnosticSink,
    ExplicitUpdate,
    Package,
    RegularUpdate,
    UnknownVersionUpdate,
    UpgradeListing,
} from '../interfaces/index.js';
import { getLogger } from './logger.utils.js';
import { Column, ColumnKey, findHeaderIndex, locateColumns, readRow, RowValues } from './table-parser.utils.js';
import { isBlankLine, splitTerminalLines } from './text.utils.js';
import { isUnknownVersion, UnknownVersionPredicate } from './version.utils.js';

export const EXPLICIT_SECTION_MARKER = 'require explicit targeting';
export const UNDETERMINED_VERSIONS_MARKER = 'version numbers that cannot be determined';

const INSTALLED_COLUMNS: readonly ColumnKey[] = ['name', 'id', 'version'];
const UPGRADE_COLUMNS: readonly ColumnKey[] = ['name', 'id', 'version', 'available'];

/**
 * Turns package manager listings into records. The fixed-width implementation
 * below is the only one today; callers depend on this interface so that a
 * structured source can replace it.
 */
export interface ListingParser {
    parseInstalled(stdout: string): Package[];
    parseUpgrades(stdout: string): UpgradeListing;
}

export interface ListingParserOptions {
    sink?: DiagnosticSink;
    isUnknownVersion?: UnknownVersionPredicate;
}

export class FixedWidthListingParser implements ListingParser {
    private readonly sink: DiagnosticSink;
    private readonly isUnknownVersion: UnknownVersionPredicate;

    constructor(options: ListingParserOptions = {}) {
        this.sink = options.sink ?? getLogger().child('listing-parser');
        this.isUnknownVersion = options.isUnknownVersion ?? isUnknownVersion;
    }

    /**
     * Parse `winget list`
     */
    parseInstalled(stdout: string): Package[] {
        const lines = splitTerminalLines(stdout);
        const headerIndex = findHeaderIndex(lines, INSTALLED_COLUMNS);
        if (headerIndex === -1) {
            throw new ParseError('could not find header');
        }

        // `Available` is read only to bound the Version column
        const columns = locateColumns(lines[headerIndex], INSTALLED_COLUMNS, ['available', 'source']);
        this.sink.record({ level: 'debug', message: 'Installed listing columns', metadata: { columns } });

        const packages: Package[] = [];
        for (const line of lines.slice(headerIndex + 1)) {
            if (line.includes(UNDETERMINED_VERSIONS_MARKER)) continue;

            const values = readRow(line, { columns, required: INSTALLED_COLUMNS, sink: this.sink });
            if (values) {
                packages.push(toPackage(values));
            }
        }

        this.sink.record({ level: 'info', message: `Found ${packages.length} installed packages` });
        return packages;
    }

    /**
     * Parse `winget list --upgrade-available` into regular, explicit and
     * unknown-version updates, keeping row order within each list
     */
    parseUpgrades(stdout: string): UpgradeListing {
        const lines = splitTerminalLines(stdout);

        // The main table, when present, always precedes the explicit-targeting notice
        const markerIndex = lines.findIndex((line) => line.includes(EXPLICIT_SECTION_MARKER));
        const headerIndex = findHeaderIndex(markerIndex === -1 ? lines : lines.slice(0, markerIndex), UPGRADE_COLUMNS);
        const explicitHeaderIndex = markerIndex === -1 ? -1 : findHeaderIndex(lines, UPGRADE_COLUMNS, markerIndex + 1);
        if (headerIndex === -1 && explicitHeaderIndex === -1) {
            throw new ParseError('could not find header');
        }

        const listing: UpgradeListing = { regular: [], explicit: [], unknown: [] };

        if (headerIndex !== -1) {
            const columns = locateColumns(lines[headerIndex], UPGRADE_COLUMNS, ['source']);
            this.sink.record({ level: 'debug', message: 'Upgrade listing columns', metadata: { columns } });

            for (const values of this.readSection(lines, headerIndex + 1, columns, [EXPLICIT_SECTION_MARKER, UNDETERMINED_VERSIONS_MARKER])) {
                if (this.isUnknownVersion(values.version)) {
                    listing.unknown.push(toUnknownVersionUpdate(values));
                } else {
                    listing.regular.push(toRegularUpdate(values));
                }
            }
        }

        if (markerIndex !== -1) {
            if (explicitHeaderIndex === -1) {
                this.sink.record({ level: 'warn', message: 'Explicit targeting section has no header', metadata: { markerIndex } });
            } else {
                listing.explicit = this.parseExplicitSection(lines, explicitHeaderIndex);
            }
        }

        this.sink.record({
            level: 'info',
            message: 'Parsed upgrade listing',
            metadata: {
                regular: listing.regular.length,
                explicit: listing.explicit.length,
                unknown: listing.unknown.length,
            },
        });
        return listing;
    }

    /**
     * The explicit-targeting table has its own header and may be aligned
     * differently from the main table. Its rows are explicit even when their
     * installed version looks unknown.
     */
    private parseExplicitSection(lines: readonly string[], headerIndex: number): ExplicitUpdate[] {
        const columns = locateColumns(lines[headerIndex], UPGRADE_COLUMNS, ['source']);
        return this.readSection(lines, headerIndex + 1, columns, [UNDETERMINED_VERSIONS_MARKER]).map(toExplicitUpdate);
    }

    /**
     * Rows from `start` up to the first blank line or terminator
     */
    private readSection(lines: readonly string[], start: number, columns: readonly Column[], terminators: readonly string[]): RowValues[] {
        const rows: RowValues[] = [];

        for (let i = start; i < lines.length; i++) {
            const line = lines[i];
            if (isBlankLine(line) || terminators.some((marker) => line.includes(marker))) break;

            const values = readRow(line, { columns, required: UPGRADE_COLUMNS, sink: this.sink });
            if (values) {
                rows.push(values);
            }
        }

        return rows;
    }
}

function toPackage(values: RowValues): Package {
    const record: Package = {
        name: values.name,
        id: values.id,
        version: values.version,
        source: values.source,
    };
    return Object.freeze(record);
}

function toRegularUpdate(values: RowValues): RegularUpdate {
    const record: RegularUpdate = {
        ...toPackage(values),
        availableVersion: values.available,
        category: 'regular',
        isUnknownVersion: false,
        requiresExplicitUpgrade: false,
    };
    return Object.freeze(record);
}

function toExplicitUpdate(values: RowValues): ExplicitUpdate {
    const record: ExplicitUpdate = {
        ...toPackage(values),
        availableVersion: values.available,
        category: 'explicit',
        isUnknownVersion: false,
        requiresExplicitUpgrade: true,
    };
    return Object.freeze(record);
}

function toUnknownVersionUpdate(values: RowValues): UnknownVersionUpdate {
    const record: UnknownVersionUpdate = {
        ...toPackage(values),
        availableVersion: values.available,
        category: 'unknown',
        isUnknownVersion: true,
        requiresExplicitUpgrade: false,
    };
    return Object.freeze(record);
}
