import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { PYTHON_VERSIONS, type PythonVersion } from '@I/compatibility.interfaces';
import { aggregate, getLogger } from '../utils/index.js';
import { parseRequirements, toCheckedResult } from '../services/index.js';
import { resolvePackages, type ServerContext } from '../context.js';
import { errorResult, jsonResult, type ToolResult } from './tool-result.js';

const PythonVersionSchema = z.enum(['2', '3']);

export const CompatibilitySchemas = {
    aggregate: z.object({
        packages: z.array(z.string().min(1)).min(1).describe('Install names to summarise, e.g. ["six", "Django"]'),
        python_version: PythonVersionSchema.default('3').describe('Python major version of the checks'),
    }),
    check: z.object({
        packages: z.array(z.string().min(1)).min(1).max(2).describe('One package for a self check, two for a pairwise check'),
        python_version: PythonVersionSchema.default('3').describe('Python major version to check under'),
        save: z.boolean().default(false).describe('Store the result after checking'),
    }),
    refresh: z.object({
        packages: z.array(z.string().min(1)).optional().describe('Packages to check (defaults to the configured portfolio)'),
        python_versions: z.array(PythonVersionSchema).min(1).default([...PYTHON_VERSIONS]).describe('Python major versions to check under'),
    }),
} as const;

export enum CompatibilityTools {
    AGGREGATE = 'aggregate_compatibility',
    CHECK = 'check_compatibility',
    REFRESH = 'refresh_compatibility_data',
}

/**
 * Per-package compatibility summaries read from the store
 */
export async function aggregateCompatibilityHandler(
    context: ServerContext,
    args: { packages: string[]; python_version: PythonVersion },
): Promise<ToolResult> {
    const logger = getLogger().child('compatibility-tool');
    logger.info('Aggregate compatibility invoked', { packages: args.packages, pythonVersion: args.python_version });

    try {
        const summaries = await aggregate(args.packages, args.python_version, context.store);
        return jsonResult(Object.fromEntries(summaries));
    } catch (error) {
        logger.error('Aggregate compatibility failed', {
            error: error instanceof Error ? error.message : String(error),
            stack: error instanceof Error ? error.stack : undefined,
        });
        return errorResult('aggregating compatibility', error);
    }
}

/**
 * Live check against the checker server, optionally saved to the store. A
 * check the server failed to answer is returned but never saved.
 */
export async function checkCompatibilityHandler(
    context: ServerContext,
    args: { packages: string[]; python_version: PythonVersion; save: boolean },
): Promise<ToolResult> {
    const logger = getLogger().child('compatibility-tool');
    logger.info('Check compatibility invoked', { packages: args.packages, pythonVersion: args.python_version, save: args.save });

    try {
        const outcome = await context.checker.check({ packages: args.packages, pythonVersion: args.python_version });
        const { response } = outcome;

        let saved = false;
        if (args.save && outcome.failed) {
            logger.warn('Checker gave no verdict, result not saved', { packages: args.packages, description: response.description });
        } else if (args.save) {
            const result = toCheckedResult(outcome, new Date());
            await context.store.saveCompatibilityResults([result]);
            saved = true;
            logger.debug('Check result saved', { packages: args.packages, status: result.status });
        }

        return jsonResult({ ...response, requirements: parseRequirements(response.requirements), saved });
    } catch (error) {
        logger.error('Check compatibility failed', {
            error: error instanceof Error ? error.message : String(error),
            stack: error instanceof Error ? error.stack : undefined,
        });
        return errorResult('checking compatibility', error);
    }
}

/**
 * Runs every self and pairwise check for the portfolio and saves the results.
 * Checks the server failed to answer are skipped so the stored rows survive
 * an outage.
 */
export async function refreshCompatibilityDataHandler(
    context: ServerContext,
    args: { packages?: string[]; python_versions: PythonVersion[] },
): Promise<ToolResult> {
    const logger = getLogger().child('compatibility-tool');

    try {
        const packages = await resolvePackages(context, args.packages);
        logger.info('Refreshing compatibility data', { packageCount: packages.length, pythonVersions: args.python_versions });

        const { results, failures } = await context.checker.collectResults(packages, args.python_versions);
        await context.store.saveCompatibilityResults(results);

        const counts: Record<string, number> = {};
        for (const result of results) {
            counts[result.status] = (counts[result.status] ?? 0) + 1;
        }

        logger.info('Compatibility data refreshed', { saved: results.length, skipped: failures.length, counts });
        return jsonResult({
            packages,
            saved: results.length,
            skipped: failures.length,
            statuses: counts,
            ...(failures.length > 0
                ? {
                      failures: failures.map(({ request, response }) => ({
                          packages: request.packages,
                          pythonVersion: request.pythonVersion,
                          description: response.description ?? null,
                      })),
                  }
                : {}),
        });
    } catch (error) {
        logger.error('Refreshing compatibility data failed', {
            error: error instanceof Error ? error.message : String(error),
            stack: error instanceof Error ? error.stack : undefined,
        });
        return errorResult('refreshing compatibility data', error);
    }
}

/**
 * Register compatibility tools with the MCP server
 */
export function registerCompatibilityTools(server: McpServer, context: ServerContext) {
    const logger = getLogger().child('compatibility-tool');

    server.registerTool(
        CompatibilityTools.AGGREGATE,
        {
            title: 'Aggregate Compatibility',
            description: 'Summarise self and pairwise compatibility for a set of packages from the stored check results',
            inputSchema: CompatibilitySchemas.aggregate.shape,
        },
        async (args) => aggregateCompatibilityHandler(context, args),
    );

    server.registerTool(
        CompatibilityTools.CHECK,
        {
            title: 'Check Compatibility',
            description: 'Ask the compatibility checker server whether one package, or a pair of packages, installs cleanly',
            inputSchema: CompatibilitySchemas.check.shape,
        },
        async (args) => checkCompatibilityHandler(context, args),
    );

    server.registerTool(
        CompatibilityTools.REFRESH,
        {
            title: 'Refresh Compatibility Data',
            description: 'Check every package and every package pair of the portfolio and store the results',
            inputSchema: CompatibilitySchemas.refresh.shape,
        },
        async (args) => refreshCompatibilityDataHandler(context, args),
    );

    logger.info('Compatibility tools registered successfully');
}
