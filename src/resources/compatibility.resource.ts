import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { readSchema } from '../services/index.js';
import { getLogger } from '../utils/index.js';
import { resolvePackages, type ServerContext } from '../context.js';

/**
 * Tracked packages together with where the list came from
 */
export async function describeTrackedPackages(context: ServerContext) {
    const packages = await resolvePackages(context);
    return {
        source: context.config.packages.length > 0 ? 'configuration' : 'store',
        packages,
        unsupported: context.config.unsupportedPackages,
        ignoredDependencies: context.config.ignoredDependencies,
    };
}

/**
 * Register compatibility resources with the MCP server
 */
export function registerCompatibilityResources(server: McpServer, context: ServerContext) {
    const logger = getLogger().child('compatibility-resource');

    server.registerResource(
        'compat-packages',
        'compat://packages',
        {
            title: 'Tracked Packages',
            description: 'Packages whose compatibility is tracked, with the Python versions they do not support',
            mimeType: 'application/json',
        },
        async (uri) => {
            const requestId = Math.random().toString(36).substring(2, 9);
            logger.debug('Serving packages resource', { requestId, uri: uri.href });

            return {
                contents: [
                    {
                        uri: uri.href,
                        mimeType: 'application/json',
                        text: JSON.stringify(await describeTrackedPackages(context), null, 2),
                    },
                ],
            };
        },
    );

    server.registerResource(
        'compat-schema',
        'compat://schema',
        {
            title: 'Compatibility Store Schema',
            description: 'SQL definition of the compatibility result tables',
            mimeType: 'application/sql',
        },
        async (uri) => {
            const requestId = Math.random().toString(36).substring(2, 9);
            logger.debug('Serving schema resource', { requestId, uri: uri.href });

            return {
                contents: [
                    {
                        uri: uri.href,
                        mimeType: 'application/sql',
                        text: readSchema(),
                    },
                ],
            };
        },
    );

    logger.info('Compatibility resources registered successfully');
}
