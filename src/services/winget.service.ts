import * as path from 'path';
import { CommandError } from '../exceptions/CommandError.js';
import {
    AppConfig,
    AvailabilityStatus,
    CommandResult,
    ExportSnapshot,
    Package,
    PackageSplit,
    ProcessLauncher,
    UpgradeListing,
} from '../interfaces/index.js';
import { loadConfig } from '../utils/config.utils.js';
import { parseUnavailablePackages } from '../utils/export.utils.js';
import { FixedWidthListingParser, ListingParser } from '../utils/listing-parser.utils.js';
import { ChildLogger, getLogger } from '../utils/logger.utils.js';
import { createUnknownVersionPredicate } from '../utils/version.utils.js';
import { SpawnProcessLauncher } from './process-launcher.service.js';

export interface WingetServiceOptions {
    /** Defaults to the configuration loaded from the environment */
    config?: AppConfig;
    launcher?: ProcessLauncher;
    parser?: ListingParser;
    logger?: ChildLogger;
}

/**
 * `winget_export_20240131_142501.json`
 */
export function exportFileName(date: Date = new Date()): string {
    const pad = (value: number) => String(value).padStart(2, '0');
    const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
    const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
    return `winget_export_${day}_${time}.json`;
}

/**
 * Query side of winget: listings, the export snapshot and the availability
 * probe. Every query that exits non-zero becomes a CommandError.
 */
export class WingetService {
    private readonly executable: string;
    private readonly exportDirectory: string;
    private readonly launcher: ProcessLauncher;
    private readonly parser: ListingParser;
    private readonly logger: ChildLogger;

    constructor(options: WingetServiceOptions = {}) {
        this.logger = options.logger ?? getLogger().child('winget');
        this.launcher = options.launcher ?? new SpawnProcessLauncher(this.logger.child('process'));

        const config = options.config ?? loadConfig();
        this.executable = config.wingetExecutable;
        this.exportDirectory = config.exportDirectory;
        this.parser =
            options.parser ??
            new FixedWidthListingParser({
                sink: this.logger.child('parser'),
                isUnknownVersion: createUnknownVersionPredicate(config.unknownVersionMarkers),
            });
    }

    getExecutable(): string {
        return this.executable;
    }

    /**
     * `winget --version`; reports rather than throws
     */
    async checkAvailability(): Promise<AvailabilityStatus> {
        try {
            const result = await this.execute(['--version']);
            const version = result.stdout.trim();
            this.logger.info('winget is available', { version });
            return { available: true, version };
        } catch (error) {
            const message = error instanceof CommandError ? error.getDiagnostic() : error instanceof Error ? error.message : String(error);
            this.logger.warn('winget is not available', { error: message });
            return { available: false, error: message };
        }
    }

    async listPackages(): Promise<Package[]> {
        const result = await this.execute(['list']);
        return this.parser.parseInstalled(result.stdout);
    }

    /**
     * Installed packages split by whether the winget catalog can update them
     */
    async getAllPackages(): Promise<PackageSplit> {
        const packages = await this.listPackages();
        const split: PackageSplit = { wingetPackages: [], otherPackages: [] };

        for (const pkg of packages) {
            if (pkg.source.toLowerCase() === 'winget') {
                split.wingetPackages.push(pkg);
            } else {
                split.otherPackages.push(pkg);
            }
        }

        this.logger.debug('Split installed packages', {
            winget: split.wingetPackages.length,
            other: split.otherPackages.length,
        });
        return split;
    }

    async checkUpdates(): Promise<UpgradeListing> {
        this.logger.info('Checking for available upgrades');
        const result = await this.execute(['list', '--upgrade-available']);
        return this.parser.parseUpgrades(result.stdout);
    }

    /**
     * `winget export -o <path> --include-versions`. The file is written for
     * backup only; the ids winget could not export are read from its output.
     */
    async exportPackages(outputPath?: string): Promise<ExportSnapshot> {
        const target = outputPath ?? path.join(this.exportDirectory, exportFileName());
        const result = await this.execute(['export', '-o', target, '--include-versions']);
        const unavailable = parseUnavailablePackages(`${result.stdout}\n${result.stderr}`);

        this.logger.info('Exported installed packages', { path: target, unavailable: unavailable.length });
        return { path: target, unavailable };
    }

    private async execute(args: string[]): Promise<CommandResult> {
        const display = [this.executable, ...args].join(' ');

        let result: CommandResult;
        try {
            result = await this.launcher.run(this.executable, args);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            this.logger.error('Failed to launch winget', { command: display, error: message });
            throw new CommandError(`Failed to run ${display}: ${message}`, display, null, message);
        }

        if (result.exitCode !== 0) {
            this.logger.error('winget command failed', { command: display, exitCode: result.exitCode, stderr: result.stderr });
            throw new CommandError(`${display} exited with code ${result.exitCode}`, display, result.exitCode, result.stderr);
        }

        return result;
    }
}

let defaultService: WingetService | null = null;

/**
 * Get or create the shared service configured from the environment
 */
export function getWingetService(): WingetService {
    if (!defaultService) {
        defaultService = new WingetService();
    }
    return defaultService;
}
