import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { PriorityVerdict } from '@I/priority.interfaces';
import { formatVerdict, getLogger } from '../utils/index.js';
import { resolvePackages, type ServerContext } from '../context.js';
import { errorResult, jsonResult, textResult, type ToolResult } from './tool-result.js';

export const DependencyHighlighterSchemas = {
    classify: z.object({
        package: z.string().min(1).describe('Install name of the package whose dependencies are classified'),
        format: z.enum(['json', 'text']).default('json').describe('JSON verdicts or a plain-text report'),
    }),
    highlight: z.object({
        packages: z.array(z.string().min(1)).optional().describe('Packages to scan (defaults to the configured portfolio)'),
    }),
    deprecated: z.object({
        packages: z.array(z.string().min(1)).optional().describe('Packages whose dependencies are looked up (defaults to the configured portfolio)'),
    }),
} as const;

const verdictView = (verdict: PriorityVerdict) => ({
    dependency: verdict.edge.dependsOn,
    installed: verdict.edge.installedVersion,
    latest: verdict.edge.latestVersion,
    latestReleasedAt: verdict.edge.latestVersionTimestamp ? verdict.edge.latestVersionTimestamp.toISOString() : null,
    priority: verdict.priority,
    reasons: verdict.reasons,
});

export async function classifyDependenciesHandler(
    context: ServerContext,
    args: { package: string; format: 'json' | 'text' },
    now: Date = new Date(),
): Promise<ToolResult> {
    const logger = getLogger().child('dependency-highlighter-tool');
    logger.info('Classify dependencies invoked', { package: args.package, format: args.format });

    try {
        const verdicts = await context.highlighter.classifyDependencies(args.package, now);

        if (args.format === 'text') {
            if (verdicts.length === 0) {
                return textResult(`No dependency information recorded for ${args.package}`);
            }
            return textResult(verdicts.map((verdict) => formatVerdict(verdict, now)).join('\n'));
        }
        return jsonResult({ package: args.package, dependencies: verdicts.map(verdictView) });
    } catch (error) {
        logger.error('Classify dependencies failed', {
            package: args.package,
            error: error instanceof Error ? error.message : String(error),
            stack: error instanceof Error ? error.stack : undefined,
        });
        return errorResult('classifying dependencies', error);
    }
}

export async function highlightOutdatedHandler(
    context: ServerContext,
    args: { packages?: string[] },
    now: Date = new Date(),
): Promise<ToolResult> {
    const logger = getLogger().child('dependency-highlighter-tool');

    try {
        const packages = await resolvePackages(context, args.packages);
        logger.info('Highlight outdated invoked', { packageCount: packages.length });

        const reports = await context.highlighter.getOutdatedDependencies(packages, now);
        return jsonResult(
            reports.map((report) => ({
                package: report.packageName,
                outdated: report.verdicts.map(verdictView),
                ...(report.error ? { error: report.error } : {}),
            })),
        );
    } catch (error) {
        logger.error('Highlight outdated failed', {
            error: error instanceof Error ? error.message : String(error),
            stack: error instanceof Error ? error.stack : undefined,
        });
        return errorResult('highlighting outdated dependencies', error);
    }
}

/**
 * Dependencies marked "Development Status :: 7 - Inactive" in the registry
 */
export async function findDeprecatedDependenciesHandler(context: ServerContext, args: { packages?: string[] }): Promise<ToolResult> {
    const logger = getLogger().child('dependency-highlighter-tool');

    try {
        const packages = await resolvePackages(context, args.packages);
        logger.info('Find deprecated dependencies invoked', { packageCount: packages.length });

        const reports = await context.deprecatedDepFinder.getDeprecatedDepsForAll(packages);
        return jsonResult(
            reports.map((report) => ({
                package: report.packageName,
                deprecated: report.deprecated,
                ...(report.unchecked.length > 0 ? { unchecked: report.unchecked } : {}),
                ...(report.error ? { error: report.error } : {}),
            })),
        );
    } catch (error) {
        logger.error('Find deprecated dependencies failed', {
            error: error instanceof Error ? error.message : String(error),
            stack: error instanceof Error ? error.stack : undefined,
        });
        return errorResult('finding deprecated dependencies', error);
    }
}

/**
 * Register dependency priority tools with the MCP server
 */
export function registerDependencyHighlighterTools(server: McpServer, context: ServerContext) {
    const logger = getLogger().child('dependency-highlighter-tool');

    server.registerTool(
        'classify_dependencies',
        {
            title: 'Classify Dependencies',
            description: 'Rate how urgently each dependency of a package needs upgrading (UP_TO_DATE, LOW or HIGH) with the reasons',
            inputSchema: DependencyHighlighterSchemas.classify.shape,
        },
        async (args) => classifyDependenciesHandler(context, args),
    );

    server.registerTool(
        'highlight_outdated',
        {
            title: 'Highlight Outdated Dependencies',
            description: 'List the dependencies needing an upgrade for every tracked package',
            inputSchema: DependencyHighlighterSchemas.highlight.shape,
        },
        async (args) => highlightOutdatedHandler(context, args),
    );

    server.registerTool(
        'find_deprecated_dependencies',
        {
            title: 'Find Deprecated Dependencies',
            description: 'List the dependencies of each package that the package registry marks as inactive',
            inputSchema: DependencyHighlighterSchemas.deprecated.shape,
        },
        async (args) => findDeprecatedDependenciesHandler(context, args),
    );

    logger.info('Dependency highlighter tools registered successfully');
}
