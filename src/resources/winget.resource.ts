import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { getWingetService, WingetService } from '../services/winget.service.js';
import { getLogger } from '../utils/index.js';

export const WingetResourceUris = {
    INSTALLED: 'winget://packages/installed',
    UPDATES: 'winget://updates/available',
} as const;

/**
 * JSON body of the installed-packages resource
 */
export async function readInstalledPackages(service: WingetService): Promise<string> {
    const split = await service.getAllPackages();
    return JSON.stringify(split, null, 2);
}

/**
 * JSON body of the available-updates resource
 */
export async function readAvailableUpdates(service: WingetService): Promise<string> {
    const listing = await service.checkUpdates();
    return JSON.stringify(listing, null, 2);
}

/**
 * Register winget resources with the MCP server
 */
export function registerWingetResources(server: McpServer, service: WingetService = getWingetService()) {
    const logger = getLogger().child('winget-resource');

    logger.info('Registering winget resources');

    server.registerResource(
        'winget-installed-packages',
        WingetResourceUris.INSTALLED,
        {
            title: 'Installed Packages',
            description: 'Installed packages from `winget list`, split into winget-catalog packages and all others',
            mimeType: 'application/json',
        },
        async (uri) => {
            logger.debug('Serving installed packages resource', { uri: uri.href });

            return {
                contents: [
                    {
                        uri: uri.href,
                        mimeType: 'application/json',
                        text: await readInstalledPackages(service),
                    },
                ],
            };
        }
    );

    server.registerResource(
        'winget-available-updates',
        WingetResourceUris.UPDATES,
        {
            title: 'Available Updates',
            description: 'Pending updates from `winget list --upgrade-available` as regular, explicit and unknown lists',
            mimeType: 'application/json',
        },
        async (uri) => {
            logger.debug('Serving available updates resource', { uri: uri.href });

            return {
                contents: [
                    {
                        uri: uri.href,
                        mimeType: 'application/json',
                        text: await readAvailableUpdates(service),
                    },
                ],
            };
        }
    );

    logger.info('Winget resources registered successfully');
}
