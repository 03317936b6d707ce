import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerCompatibilityTools } from './compatibility.tool.js';
import { registerDependencyHighlighterTools } from './dependency-highlighter.tool.js';
import { registerBadgeTools } from './badge.tool.js';
import { getLogger } from '../utils/index.js';
import type { ServerContext } from '../context.js';

/**
 * Register all tools with the MCP server
 */
export function registerAllTools(server: McpServer, context: ServerContext) {
    const logger = getLogger().child('tools');

    logger.info('Starting tool registration');

    logger.debug('Registering compatibility tools');
    registerCompatibilityTools(server, context);

    logger.debug('Registering dependency highlighter tools');
    registerDependencyHighlighterTools(server, context);

    logger.debug('Registering badge tools');
    registerBadgeTools(server, context);

    logger.info('All tools registered successfully');
}
