import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerWingetResources } from './winget.resource.js';
import { WingetService } from '../services/winget.service.js';
import { getLogger } from '../utils/index.js';

/**
 * Register all resources with the MCP server
 */
export function registerAllResources(server: McpServer, service?: WingetService) {
    const logger = getLogger().child('resources');

    logger.info('Starting resource registration');
    registerWingetResources(server, service);
    logger.info('All resources registered successfully');
}
