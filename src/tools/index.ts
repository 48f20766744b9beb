import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerWingetTools } from './winget.tool.js';
import { WingetService } from '../services/winget.service.js';
import { getLogger } from '../utils/index.js';

/**
 * Register all tools with the MCP server
 */
export function registerAllTools(server: McpServer, service?: WingetService) {
    const logger = getLogger().child('tools');

    logger.info('Starting tool registration');
    registerWingetTools(server, service);
    logger.info('All tools registered successfully');
}
