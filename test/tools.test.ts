import { expect } from 'chai';
import { afterEach, beforeEach, describe, it } from 'mocha';
import { existsSync, mkdtempSync, readFileSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { CompatibilityStatus } from '@I/compatibility.interfaces';
import { BadgeKind } from '@I/badge.interfaces';
import { loadConfig } from '@U/config.utils';
import { InMemoryCompatibilityStore } from '@S/memory-store.service';
import { PACKAGE_NOT_IN_WHITELIST } from '@S/compatibility-checker.service';
import { DEPRECATED_STATUS } from '@U/deprecated-dep-finder.utils';
import { createServerContext, type ServerContext } from '@/context';
import { aggregateCompatibilityHandler, checkCompatibilityHandler, refreshCompatibilityDataHandler } from '@T/compatibility.tool';
import { classifyDependenciesHandler, findDeprecatedDependenciesHandler, highlightOutdatedHandler } from '@T/dependency-highlighter.tool';
import { buildDashboardHandler, packageBadgeHandler } from '@T/badge.tool';
import type { ToolResult } from '@T/tool-result';
import { describeTrackedPackages } from '@R/compatibility.resource';
import { NOW, edge, jsonResponse, result, stubFetch } from './helpers';

const textOf = (toolResult: ToolResult): string => toolResult.content[0].text;

const unreachable = async (): Promise<Response> => {
    throw new Error('connect ECONNREFUSED');
};

class BrokenStore extends InMemoryCompatibilityStore {
    async getPackages(): Promise<string[]> {
        throw new Error('store offline');
    }
}

describe('MCP Tools', function () {
    let store: InMemoryCompatibilityStore;
    let context: ServerContext;

    beforeEach(async function () {
        store = new InMemoryCompatibilityStore();
        const { fetchFn } = stubFetch((packages) => {
            if (packages.length === 2) {
                return jsonResponse({ result: 'CONFLICT', packages, description: 'version clash' });
            }
            return jsonResponse({
                result: 'SUCCESS',
                packages,
                dependency_info: { [packages[0]]: { installed_version: '1.0.0', latest_version: '1.0.0' } },
            });
        });
        const config = loadConfig({ packages: ['six', 'Django'], databasePath: ':memory:', serverUrl: 'http://checker.test' }, {});
        context = createServerContext(config, { store, fetchFn });

        await store.putSelfStatus(result(['six'], CompatibilityStatus.SUCCESS));
        await store.putSelfStatus(result(['Django'], CompatibilityStatus.SUCCESS));
        await store.putPairwiseStatus(result(['six', 'Django'], CompatibilityStatus.SUCCESS));
        await store.putDependencyEdges('six', [edge('six', '1.12.0', '1.12.0', NOW, 'six'), edge('attrs', '18.2.0', '19.1.0', NOW, 'six')]);
    });

    describe('aggregate_compatibility', function () {
        it('should return a summary per package', async function () {
            const response = await aggregateCompatibilityHandler(context, { packages: ['six', 'Django'], python_version: '3' });
            const summaries = JSON.parse(textOf(response));

            expect(response.isError).to.be.undefined;
            expect(Object.keys(summaries)).to.deep.equal(['six', 'Django']);
            expect(summaries.six.status).to.equal('SUCCESS');
            expect(summaries.Django.pairs).to.deep.equal([{ otherPackage: 'six', status: 'SUCCESS', details: null, found: true }]);
        });
    });

    describe('check_compatibility', function () {
        it('should return the server response and save it when asked', async function () {
            const response = await checkCompatibilityHandler(context, { packages: ['attrs', 'six'], python_version: '2', save: true });

            expect(JSON.parse(textOf(response))).to.deep.equal({
                result: 'CONFLICT',
                packages: ['attrs', 'six'],
                description: 'version clash',
                requirements: {},
                saved: true,
            });
            expect((await store.getPairwiseStatus('six', 'attrs', '2'))?.status).to.equal(CompatibilityStatus.CONFLICT);
        });

        it('should leave the store alone without save', async function () {
            await checkCompatibilityHandler(context, { packages: ['attrs'], python_version: '3', save: false });

            expect(await store.getSelfStatus('attrs', '3')).to.be.undefined;
        });

        it('should return the pinned requirements as a map', async function () {
            const { fetchFn } = stubFetch((packages) =>
                jsonResponse({ result: 'SUCCESS', packages, requirements: 'attrs==19.1.0\nsix==1.12.0\n' }),
            );
            const pinned = createServerContext(loadConfig({ databasePath: ':memory:' }, {}), { store, fetchFn });

            const response = await checkCompatibilityHandler(pinned, { packages: ['attrs'], python_version: '3', save: false });

            expect(JSON.parse(textOf(response)).requirements).to.deep.equal({ attrs: '19.1.0', six: '1.12.0' });
        });

        it('should not save a check the server failed to answer', async function () {
            const offline = createServerContext(loadConfig({ databasePath: ':memory:' }, {}), { store, fetchFn: unreachable });

            const response = await checkCompatibilityHandler(offline, { packages: ['six'], python_version: '3', save: true });

            expect(JSON.parse(textOf(response))).to.deep.equal({
                result: 'UNKNOWN',
                packages: ['six'],
                description: 'Checker request failed: connect ECONNREFUSED',
                requirements: {},
                saved: false,
            });
            expect((await store.getSelfStatus('six', '3'))?.status).to.equal(CompatibilityStatus.SUCCESS);
        });

        it('should save the UNKNOWN the server gives for packages outside its whitelist', async function () {
            const { fetchFn } = stubFetch(() => new Response(PACKAGE_NOT_IN_WHITELIST));
            const whitelisted = createServerContext(loadConfig({ databasePath: ':memory:' }, {}), { store, fetchFn });

            const response = await checkCompatibilityHandler(whitelisted, { packages: ['git+https://github.com/example/pkg.git'], python_version: '3', save: true });

            expect(JSON.parse(textOf(response)).saved).to.be.true;
            expect(await store.getSelfStatus('git+https://github.com/example/pkg.git', '3')).to.include({
                status: CompatibilityStatus.UNKNOWN,
                details: PACKAGE_NOT_IN_WHITELIST,
            });
        });
    });

    describe('refresh_compatibility_data', function () {
        it('should check the configured portfolio and save every result', async function () {
            const response = await refreshCompatibilityDataHandler(context, { python_versions: ['3'] });

            expect(JSON.parse(textOf(response))).to.deep.equal({
                packages: ['six', 'Django'],
                saved: 3,
                skipped: 0,
                statuses: { SUCCESS: 2, CONFLICT: 1 },
            });
            expect((await store.getPairwiseStatus('six', 'Django', '3'))?.status).to.equal(CompatibilityStatus.CONFLICT);
        });

        it('should keep the stored results when the checker server is down', async function () {
            const config = loadConfig({ packages: ['six', 'Django'], databasePath: ':memory:' }, {});
            const offline = createServerContext(config, { store, fetchFn: unreachable });
            const failure = (packages: string[]) => ({ packages, pythonVersion: '3', description: 'Checker request failed: connect ECONNREFUSED' });

            const response = await refreshCompatibilityDataHandler(offline, { python_versions: ['3'] });

            expect(JSON.parse(textOf(response))).to.deep.equal({
                packages: ['six', 'Django'],
                saved: 0,
                skipped: 3,
                statuses: {},
                failures: [failure(['six']), failure(['Django']), failure(['six', 'Django'])],
            });
            expect((await store.getSelfStatus('six', '3'))?.status).to.equal(CompatibilityStatus.SUCCESS);
            expect((await store.getSelfStatus('Django', '3'))?.status).to.equal(CompatibilityStatus.SUCCESS);
            expect((await store.getPairwiseStatus('six', 'Django', '3'))?.status).to.equal(CompatibilityStatus.SUCCESS);
        });
    });

    describe('classify_dependencies', function () {
        it('should return verdicts as JSON', async function () {
            const response = await classifyDependenciesHandler(context, { package: 'six', format: 'json' }, NOW);
            const body = JSON.parse(textOf(response));

            expect(body.package).to.equal('six');
            expect(body.dependencies).to.deep.equal([
                {
                    dependency: 'attrs',
                    installed: '18.2.0',
                    latest: '19.1.0',
                    latestReleasedAt: '2024-06-01T00:00:00.000Z',
                    priority: 'HIGH',
                    reasons: ['major-release-available'],
                },
                {
                    dependency: 'six',
                    installed: '1.12.0',
                    latest: '1.12.0',
                    latestReleasedAt: '2024-06-01T00:00:00.000Z',
                    priority: 'UP_TO_DATE',
                    reasons: [],
                },
            ]);
        });

        it('should render a text report', async function () {
            const response = await classifyDependenciesHandler(context, { package: 'six', format: 'text' }, NOW);

            expect(textOf(response).split('\n')[0]).to.equal('Dependency Name:\tattrs');
        });
    });

    describe('highlight_outdated', function () {
        it('should list outdated dependencies per tracked package', async function () {
            const response = await highlightOutdatedHandler(context, {}, NOW);
            const reports = JSON.parse(textOf(response));

            expect(reports.map((report: { package: string }) => report.package)).to.deep.equal(['six', 'Django']);
            expect(reports[0].outdated).to.have.length(1);
            expect(reports[1].outdated).to.deep.equal([]);
        });

        it('should return an error result when the store fails', async function () {
            const config = loadConfig({ databasePath: ':memory:' }, {});
            const broken = createServerContext(config, { store: new BrokenStore() });

            const response = await highlightOutdatedHandler(broken, {}, NOW);

            expect(response.isError).to.be.true;
            expect(textOf(response)).to.equal('Error highlighting outdated dependencies: store offline');
        });
    });

    describe('find_deprecated_dependencies', function () {
        it('should list dependencies the registry marks inactive', async function () {
            const { fetchFn, calls } = stubFetch((_packages, _pythonVersion, url) =>
                jsonResponse({ info: { classifiers: url.pathname === '/pypi/attrs/json' ? [DEPRECATED_STATUS] : [] } }),
            );
            const config = loadConfig({ packages: ['six'], databasePath: ':memory:', registryUrl: 'http://registry.test/pypi' }, {});
            const registryContext = createServerContext(config, { store, fetchFn });

            const response = await findDeprecatedDependenciesHandler(registryContext, {});

            expect(JSON.parse(textOf(response))).to.deep.equal([{ package: 'six', deprecated: ['attrs'] }]);
            expect(calls.map((url) => url.host)).to.deep.equal(['registry.test', 'registry.test']);
        });
    });

    describe('package_badge', function () {
        it('should render the dependency badge as SVG', async function () {
            const response = await packageBadgeHandler(context, { package: 'six', kind: BadgeKind.DEPENDENCY, format: 'svg' }, NOW);

            expect(textOf(response)).to.include('aria-label="six: HIGH PRIORITY"');
        });

        it('should return the underlying results as JSON', async function () {
            const response = await packageBadgeHandler(context, { package: 'six', kind: BadgeKind.SELF, format: 'json' }, NOW);
            const body = JSON.parse(textOf(response));

            expect(body.status).to.equal('CALCULATING');
            expect(body.results.self.py3).to.deep.equal({ status: 'SUCCESS', details: null });
        });
    });

    describe('build_dashboard', function () {
        let outputDir: string;

        beforeEach(function () {
            outputDir = mkdtempSync(join(tmpdir(), 'dashboard-'));
        });

        afterEach(function () {
            rmSync(outputDir, { recursive: true, force: true });
        });

        it('should return the page and write it when an output path is given', async function () {
            const outputPath = join(outputDir, 'site', 'index.html');

            const response = await buildDashboardHandler(context, { python_version: '3', output_path: outputPath }, NOW);

            expect(existsSync(outputPath)).to.be.true;
            expect(readFileSync(outputPath, 'utf8')).to.equal(textOf(response));
            expect(textOf(response)).to.include('<span id="total-packages">Packages: 2</span>');
        });
    });

    describe('compat://packages', function () {
        it('should describe the configured portfolio', async function () {
            expect(await describeTrackedPackages(context)).to.deep.equal({
                source: 'configuration',
                packages: ['six', 'Django'],
                unsupported: { '2': [], '3': [] },
                ignoredDependencies: [],
            });
        });
    });
});
