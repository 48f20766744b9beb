#!/usr/bin/env node

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { registerAllTools } from './tools/index.js';
import { registerAllResources } from './resources/index.js';
import { WingetService } from './services/winget.service.js';
import { initializeLogger, loadConfig } from './utils/index.js';

const config = loadConfig();

const logger = initializeLogger({
    level: config.logLevel,
    enableFileLogging: config.logToFile,
    logDirectory: config.logDirectory,
    enableConsoleLogging: true, // stderr only, stdout carries MCP traffic
});

const server = new McpServer({
    name: 'winget-updates-installer',
    version: '0.1.0',
});

logger.info('Winget updates MCP server initializing', 'main', {
    executable: config.wingetExecutable,
    silentInstall: config.silentInstall,
});

const service = new WingetService({ config, logger: logger.child('winget') });

registerAllTools(server, service);
registerAllResources(server, service);

async function main() {
    const status = await service.checkAvailability();
    if (!status.available) {
        logger.warn('winget was not found; tools will report errors until it is installed', 'main', { error: status.error });
    }

    logger.info('Starting MCP server transport', 'main');
    const transport = new StdioServerTransport();
    await server.connect(transport);

    logger.info('Winget updates MCP server running on stdio', 'main', {
        logFile: config.logToFile ? logger.getLogFilePath() : undefined,
    });
}

main().catch((error) => {
    logger.error('Fatal error in main()', 'main', {
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
    });
    process.exit(1);
});
