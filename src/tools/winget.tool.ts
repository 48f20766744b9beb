import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { CommandError } from '../exceptions/CommandError.js';
import { InstallEvent, Package, PackageUpdate, UpdateCategory, UpgradeListing } from '../interfaces/index.js';
import { collectInstallRun, renderTranscript, UpdateOrchestrator } from '../services/update-orchestrator.service.js';
import { getWingetService, WingetService } from '../services/winget.service.js';
import { loadConfig } from '../utils/config.utils.js';
import { readExportFile } from '../utils/export.utils.js';
import { getLogger } from '../utils/logger.utils.js';

/**
 * Schema definitions for the winget tools
 */
export const WingetSchemas = {
    list: z.object({
        source: z.enum(['all', 'winget', 'other']).default('all').describe('Which installed packages to return: all, only those from the winget catalog, or all others'),
    }),
    install: z.object({
        ids: z.array(z.string().min(1)).optional().describe('Package identifiers to upgrade, in install order. Omit to upgrade every update in the selected categories'),
        categories: z
            .array(z.enum(['regular', 'explicit', 'unknown']))
            .min(1)
            .default(['regular'])
            .describe('Update categories to select from (default: regular)'),
        silent: z.boolean().optional().describe('Pass --silent to every upgrade (defaults to WINGET_SILENT_INSTALL)'),
    }),
    export: z.object({
        output_path: z.string().optional().describe('Where to write the export JSON (defaults to a timestamped file in the export directory)'),
        summarize: z.boolean().default(false).describe('Read the written file back and list the exported package ids'),
    }),
} as const;

export enum WingetTools {
    STATUS = 'winget_status',
    LIST_PACKAGES = 'winget_list_packages',
    CHECK_UPDATES = 'winget_check_updates',
    INSTALL_UPDATES = 'winget_install_updates',
    EXPORT = 'winget_export',
}

export interface ToolResponse {
    [key: string]: unknown;
    content: Array<{ type: 'text'; text: string }>;
    isError?: boolean;
}

function textResponse(text: string, isError = false): ToolResponse {
    return isError ? { content: [{ type: 'text', text }], isError } : { content: [{ type: 'text', text }] };
}

function errorResponse(error: unknown): ToolResponse {
    if (error instanceof CommandError) {
        return textResponse(`❌ ${error.message}\n\n${error.getDiagnostic()}`, true);
    }
    return textResponse(`❌ ${error instanceof Error ? error.message : String(error)}`, true);
}

export function formatPackage(pkg: Package): string {
    const source = pkg.source ? ` [${pkg.source}]` : '';
    return `- ${pkg.name} (${pkg.id}) ${pkg.version}${source}`;
}

export function formatUpdate(update: PackageUpdate): string {
    const source = update.source ? ` [${update.source}]` : '';
    return `- ${update.name} (${update.id}) ${update.version} -> ${update.availableVersion}${source}`;
}

export function formatUpgradeListing(listing: UpgradeListing): string {
    const sections: Array<[string, PackageUpdate[]]> = [
        ['Regular updates', listing.regular],
        ['Updates requiring explicit targeting', listing.explicit],
        ['Updates with unknown installed version', listing.unknown],
    ];

    return sections.map(([title, updates]) => [`${title} (${updates.length}):`, ...(updates.length ? updates.map(formatUpdate) : ['(none)'])].join('\n')).join('\n\n');
}

/**
 * Pick updates by category and, when given, by id in the caller's order
 */
export function selectUpdates(
    listing: UpgradeListing,
    categories: readonly UpdateCategory[],
    ids?: readonly string[]
): { selected: PackageUpdate[]; missing: string[] } {
    const pool: PackageUpdate[] = [];
    if (categories.includes('regular')) pool.push(...listing.regular);
    if (categories.includes('explicit')) pool.push(...listing.explicit);
    if (categories.includes('unknown')) pool.push(...listing.unknown);

    if (!ids) {
        return { selected: pool, missing: [] };
    }

    const byId = new Map(pool.map((update) => [update.id.toLowerCase(), update]));
    const selected: PackageUpdate[] = [];
    const missing: string[] = [];
    for (const id of ids) {
        const update = byId.get(id.toLowerCase());
        if (update && !selected.includes(update)) {
            selected.push(update);
        } else if (!update) {
            missing.push(id);
        }
    }
    return { selected, missing };
}

export async function statusHandler(service: WingetService): Promise<ToolResponse> {
    const status = await service.checkAvailability();
    if (status.available) {
        return textResponse(`✅ winget is installed and ready!\nVersion: ${status.version}`);
    }
    return textResponse(`❌ winget is not available: ${status.error}`, true);
}

export async function listPackagesHandler(service: WingetService, params: z.infer<typeof WingetSchemas.list>): Promise<ToolResponse> {
    try {
        let packages: Package[];
        if (params.source === 'all') {
            packages = await service.listPackages();
        } else {
            const split = await service.getAllPackages();
            packages = params.source === 'winget' ? split.wingetPackages : split.otherPackages;
        }

        return textResponse([`Installed packages (${packages.length}):`, ...packages.map(formatPackage)].join('\n'));
    } catch (error) {
        return errorResponse(error);
    }
}

export async function checkUpdatesHandler(service: WingetService): Promise<ToolResponse> {
    try {
        const listing = await service.checkUpdates();
        return textResponse(formatUpgradeListing(listing));
    } catch (error) {
        return errorResponse(error);
    }
}

export interface InstallHandlerOptions {
    signal?: AbortSignal;
    onEvent?: (event: InstallEvent, position: number) => Promise<void>;
    defaultSilent?: boolean;
}

/**
 * Re-read the upgrade listing, select from it and install the selection,
 * answering with the rendered transcript
 */
export async function installUpdatesHandler(
    service: WingetService,
    orchestrator: UpdateOrchestrator,
    params: z.infer<typeof WingetSchemas.install>,
    options: InstallHandlerOptions = {}
): Promise<ToolResponse> {
    try {
        const listing = await service.checkUpdates();
        const { selected, missing } = selectUpdates(listing, params.categories, params.ids);

        const run = orchestrator.install(selected, {
            silent: params.silent ?? options.defaultSilent ?? false,
            signal: options.signal,
        });

        const { events, summary } = await collectInstallRun(run, options.onEvent);

        const lines = summary.status === 'nothing-selected' ? [summary.message] : renderTranscript(events);
        if (missing.length) {
            lines.unshift(`No pending update found for: ${missing.join(', ')}`);
        }

        const failed = summary.status === 'all-failed' || summary.status === 'aborted';
        return textResponse(lines.join('\n'), failed);
    } catch (error) {
        return errorResponse(error);
    }
}

export async function exportHandler(service: WingetService, params: z.infer<typeof WingetSchemas.export>): Promise<ToolResponse> {
    try {
        const snapshot = await service.exportPackages(params.output_path);
        const lines = [`✅ Exported installed packages to ${snapshot.path}`];

        if (snapshot.unavailable.length) {
            lines.push('', `Not available from any source (${snapshot.unavailable.length}):`, ...snapshot.unavailable.map((name) => `- ${name}`));
        }

        if (params.summarize) {
            const exported = readExportFile(snapshot.path);
            lines.push('', `Exported packages (${exported.length}):`, ...exported.map((pkg) => `- ${pkg.id}${pkg.version ? ` ${pkg.version}` : ''}`));
        }

        return textResponse(lines.join('\n'));
    } catch (error) {
        return errorResponse(error);
    }
}

/**
 * Register winget tools with the MCP server
 */
export function registerWingetTools(server: McpServer, service: WingetService = getWingetService(), orchestrator?: UpdateOrchestrator) {
    const logger = getLogger().child('winget-tool');
    const config = loadConfig();
    const installer = orchestrator ?? new UpdateOrchestrator({ executable: service.getExecutable(), sink: logger.child('orchestrator') });

    logger.info('Registering winget tools');

    server.registerTool(
        WingetTools.STATUS,
        {
            title: 'Winget Status',
            description: 'Check that winget is installed and report its version',
            inputSchema: {},
        },
        async () => {
            logger.info('winget status tool invoked');
            return statusHandler(service);
        }
    );

    server.registerTool(
        WingetTools.LIST_PACKAGES,
        {
            title: 'List Installed Packages',
            description: 'List installed packages reported by `winget list`, optionally only those updatable from the winget catalog',
            inputSchema: WingetSchemas.list.shape,
        },
        async (params) => {
            logger.info('List packages tool invoked', { source: params.source });
            return listPackagesHandler(service, params);
        }
    );

    server.registerTool(
        WingetTools.CHECK_UPDATES,
        {
            title: 'Check For Updates',
            description: 'Run `winget list --upgrade-available` and report regular, explicit-targeting and unknown-version updates',
            inputSchema: {},
        },
        async () => {
            logger.info('Check updates tool invoked');
            return checkUpdatesHandler(service);
        }
    );

    server.registerTool(
        WingetTools.INSTALL_UPDATES,
        {
            title: 'Install Updates',
            description: 'Install selected updates one at a time with `winget upgrade`, reporting progress and a final summary. One failed package does not stop the batch.',
            inputSchema: WingetSchemas.install.shape,
        },
        async (params, extra) => {
            const requestId = Math.random().toString(36).substring(2, 9);
            logger.info('Install updates tool invoked', { requestId, ids: params.ids, categories: params.categories, silent: params.silent });

            const progressToken = extra._meta?.progressToken;
            const onEvent =
                progressToken === undefined
                    ? undefined
                    : async (event: InstallEvent, position: number) => {
                          await extra.sendNotification({
                              method: 'notifications/progress',
                              params: { progressToken, progress: position, message: event.message },
                          });
                      };

            const startTime = Date.now();
            const response = await installUpdatesHandler(service, installer, params, {
                signal: extra.signal,
                onEvent,
                defaultSilent: config.silentInstall,
            });
            logger.info('Install updates tool completed', { requestId, executionTimeMs: Date.now() - startTime, isError: !!response.isError });
            return response;
        }
    );

    server.registerTool(
        WingetTools.EXPORT,
        {
            title: 'Export Installed Packages',
            description: 'Write a `winget export --include-versions` backup file and report packages that are not available from any source',
            inputSchema: WingetSchemas.export.shape,
        },
        async (params) => {
            logger.info('Export tool invoked', { output_path: params.output_path, summarize: params.summarize });
            return exportHandler(service, params);
        }
    );

    logger.info('Winget tools registered successfully');
}
