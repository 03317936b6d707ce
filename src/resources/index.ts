import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerCompatibilityResources } from './compatibility.resource.js';
import { getLogger } from '../utils/index.js';
import type { ServerContext } from '../context.js';

/**
 * Register all resources with the MCP server
 */
export function registerAllResources(server: McpServer, context: ServerContext) {
    const logger = getLogger().child('resources');

    logger.info('Starting resource registration');

    logger.debug('Registering compatibility resources');
    registerCompatibilityResources(server, context);

    logger.info('All resources registered successfully');
}
