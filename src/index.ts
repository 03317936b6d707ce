#!/usr/bin/env node

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { registerAllTools } from '@T/index.js';
import { registerAllResources } from '@R/index.js';
import { initializeLogger } from '@U/logger.utils.js';
import { loadConfig } from '@U/config.utils.js';
import { createServerContext } from './context.js';

const SERVER_INFO = {
    name: 'depcompat',
    version: '0.1.0',
};

const config = loadConfig();

// Console output stays off: stdout carries the MCP stdio protocol
const logger = initializeLogger({
    level: config.logLevel,
    enableFileLogging: true,
    logDirectory: config.logDirectory,
    enableConsoleLogging: false,
});

const context = createServerContext(config);

const server = new McpServer(SERVER_INFO);

logger.info('depcompat MCP Server initializing', 'main', {
    ...SERVER_INFO,
    serverUrl: config.serverUrl,
    databasePath: config.databasePath,
    trackedPackages: config.packages.length,
});

registerAllTools(server, context);
registerAllResources(server, context);

async function main() {
    try {
        logger.info('Starting MCP server transport', 'main');
        const transport = new StdioServerTransport();
        await server.connect(transport);

        logger.info('depcompat MCP Server running on stdio', 'main', {
            logFile: logger.getLogFilePath(),
        });

        console.error('depcompat MCP Server running on stdio');
    } catch (error) {
        logger.error('Failed to start MCP server', 'main', {
            error: error instanceof Error ? error.message : String(error),
            stack: error instanceof Error ? error.stack : undefined,
        });
        throw error;
    }
}

main().catch((error) => {
    logger.error('Fatal error in main()', 'main', {
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
    });

    console.error('Fatal error in main():', error);
    process.exit(1);
});
