import * as fs from 'fs';
import * as path from 'path';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { BadgeKind, type BadgeStatus, type PackageBadgeResults } from '@I/badge.interfaces';
import type { PythonVersion } from '@I/compatibility.interfaces';
import {
    badgeLabel,
    buildDashboardModel,
    collectBadgeResults,
    compatibilityBadgeStatus,
    getLogger,
    overallBadgeStatus,
    renderBadge,
    renderDashboard,
} from '../utils/index.js';
import { resolvePackages, type ServerContext } from '../context.js';
import { errorResult, jsonResult, textResult, type ToolResult } from './tool-result.js';

export const BadgeSchemas = {
    badge: z.object({
        package: z.string().min(1).describe('Install name of the package, or its GitHub URL'),
        badge_name: z.string().optional().describe('Label for the left half of the badge'),
        kind: z.nativeEnum(BadgeKind).default(BadgeKind.OVERALL).describe('Which check the badge reports'),
        format: z.enum(['svg', 'json']).default('svg').describe('The SVG image or the underlying results'),
    }),
    dashboard: z.object({
        packages: z.array(z.string().min(1)).optional().describe('Packages on the grid (defaults to the configured portfolio)'),
        python_version: z.enum(['2', '3']).default('3').describe('Python major version of the results shown'),
        output_path: z.string().optional().describe('Write the HTML page to this file as well'),
    }),
} as const;

export function badgeStatusFor(kind: BadgeKind, results: PackageBadgeResults, packageName: string, py2Unsupported: readonly string[]): BadgeStatus {
    switch (kind) {
        case BadgeKind.SELF:
            return compatibilityBadgeStatus(results.self, packageName, py2Unsupported);
        case BadgeKind.PORTFOLIO:
            return compatibilityBadgeStatus(results.portfolio, packageName, py2Unsupported);
        case BadgeKind.DEPENDENCY:
            return results.dependency.status;
        case BadgeKind.OVERALL:
            return overallBadgeStatus(results);
    }
}

export async function packageBadgeHandler(
    context: ServerContext,
    args: { package: string; badge_name?: string; kind: BadgeKind; format: 'svg' | 'json' },
    now: Date = new Date(),
): Promise<ToolResult> {
    const logger = getLogger().child('badge-tool');
    logger.info('Package badge invoked', { package: args.package, kind: args.kind, format: args.format });

    try {
        const portfolio = await resolvePackages(context);
        const results = await collectBadgeResults(args.package, {
            store: context.store,
            highlighter: context.highlighter,
            portfolio,
            now,
        });
        const status = badgeStatusFor(args.kind, results, args.package, context.config.unsupportedPackages['2']);

        logger.debug('Badge status resolved', { package: args.package, kind: args.kind, status });

        if (args.format === 'json') {
            return jsonResult({ package: args.package, kind: args.kind, status, results });
        }
        return textResult(renderBadge(badgeLabel(args.package, args.badge_name), status));
    } catch (error) {
        logger.error('Package badge failed', {
            package: args.package,
            error: error instanceof Error ? error.message : String(error),
            stack: error instanceof Error ? error.stack : undefined,
        });
        return errorResult('rendering badge', error);
    }
}

export async function buildDashboardHandler(
    context: ServerContext,
    args: { packages?: string[]; python_version: PythonVersion; output_path?: string },
    now: Date = new Date(),
): Promise<ToolResult> {
    const logger = getLogger().child('badge-tool');

    try {
        const packages = await resolvePackages(context, args.packages);
        logger.info('Build dashboard invoked', { packageCount: packages.length, pythonVersion: args.python_version });

        const model = await buildDashboardModel(packages, args.python_version, {
            store: context.store,
            highlighter: context.highlighter,
            now,
        });
        const html = renderDashboard(model);

        if (args.output_path) {
            const outputPath = path.resolve(args.output_path);
            fs.mkdirSync(path.dirname(outputPath), { recursive: true });
            fs.writeFileSync(outputPath, html, 'utf8');
            logger.info('Dashboard written', { outputPath });
        }

        return textResult(html);
    } catch (error) {
        logger.error('Build dashboard failed', {
            error: error instanceof Error ? error.message : String(error),
            stack: error instanceof Error ? error.stack : undefined,
        });
        return errorResult('building dashboard', error);
    }
}

/**
 * Register badge and dashboard tools with the MCP server
 */
export function registerBadgeTools(server: McpServer, context: ServerContext) {
    const logger = getLogger().child('badge-tool');

    server.registerTool(
        'package_badge',
        {
            title: 'Package Badge',
            description: 'Render the compatibility badge of a package as SVG (self, portfolio, dependency or overall)',
            inputSchema: BadgeSchemas.badge.shape,
        },
        async (args) => packageBadgeHandler(context, args),
    );

    server.registerTool(
        'build_dashboard',
        {
            title: 'Build Dashboard',
            description: 'Render the HTML compatibility grid for the tracked packages',
            inputSchema: BadgeSchemas.dashboard.shape,
        },
        async (args) => buildDashboardHandler(context, args),
    );

    logger.info('Badge tools registered successfully');
}
