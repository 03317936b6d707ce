import { expect } from 'chai';
import { beforeEach, describe, it } from 'mocha';
import { DependencyHighlighter } from '@U/dependency-highlighter.utils';
import { DEPRECATED_STATUS, DeprecatedDepFinder } from '@U/deprecated-dep-finder.utils';
import { InMemoryCompatibilityStore } from '@S/memory-store.service';
import { CompatibilityCheckerService, PACKAGE_NOT_IN_WHITELIST } from '@S/compatibility-checker.service';
import { edge, jsonResponse, stubFetch } from './helpers';

const REGISTRY_URL = 'https://registry.test/pypi/';

const registry: Record<string, string[] | null> = {
    requests: ['Development Status :: 5 - Production/Stable', 'License :: OSI Approved :: Apache Software License'],
    pytz: ['License :: OSI Approved :: MIT License', DEPRECATED_STATUS],
    six: null,
};

const registryFetch = () =>
    stubFetch((_packages, _pythonVersion, url) => {
        const name = url.pathname.split('/')[2];
        if (!(name in registry)) {
            return new Response('Not Found', { status: 404 });
        }
        return jsonResponse({ info: { name, classifiers: registry[name] } });
    });

describe('Deprecated Dependency Finder', function () {
    let store: InMemoryCompatibilityStore;

    beforeEach(async function () {
        store = new InMemoryCompatibilityStore();
        await store.putDependencyEdges('my-package', [
            edge('requests', '2.21.0', '2.22.0'),
            edge('pytz', '2019.1', '2019.1'),
            edge('attrs', '19.1.0', '19.1.0'),
        ]);
    });

    describe('getDevelopmentStatus', function () {
        it('should read the development status classifier wherever it is listed', async function () {
            const { fetchFn, calls } = registryFetch();
            const finder = new DeprecatedDepFinder({ highlighter: new DependencyHighlighter({ store }), registryUrl: REGISTRY_URL, fetchFn });

            expect(await finder.getDevelopmentStatus('pytz')).to.equal(DEPRECATED_STATUS);
            expect(await finder.getDevelopmentStatus('requests')).to.equal('Development Status :: 5 - Production/Stable');
            expect(calls[0].href).to.equal('https://registry.test/pypi/pytz/json');
        });

        it('should return null for a package without classifiers', async function () {
            const { fetchFn } = registryFetch();
            const finder = new DeprecatedDepFinder({ highlighter: new DependencyHighlighter({ store }), registryUrl: REGISTRY_URL, fetchFn });

            expect(await finder.getDevelopmentStatus('six')).to.be.null;
        });
    });

    describe('getDeprecatedDeps', function () {
        it('should list inactive dependencies and the ones the registry could not answer for', async function () {
            const { fetchFn, calls } = registryFetch();
            const finder = new DeprecatedDepFinder({ highlighter: new DependencyHighlighter({ store }), registryUrl: REGISTRY_URL, fetchFn });

            const report = await finder.getDeprecatedDeps('my-package');

            expect(report).to.deep.equal({ packageName: 'my-package', deprecated: ['pytz'], unchecked: ['attrs'] });
            expect(calls.map((url) => url.pathname)).to.have.members(['/pypi/attrs/json', '/pypi/pytz/json', '/pypi/requests/json']);
        });
    });

    describe('getDeprecatedDepsForAll', function () {
        it('should report a package without dependency info without failing the others', async function () {
            const checker = new CompatibilityCheckerService(
                { serverUrl: 'http://checker.test' },
                stubFetch(() => new Response(PACKAGE_NOT_IN_WHITELIST)).fetchFn,
            );
            const { fetchFn } = registryFetch();
            const finder = new DeprecatedDepFinder({
                highlighter: new DependencyHighlighter({ store, checker }),
                registryUrl: REGISTRY_URL,
                fetchFn,
                maxWorkers: 1,
            });

            const reports = await finder.getDeprecatedDepsForAll(['private-pkg', 'my-package']);

            expect(reports).to.deep.equal([
                {
                    packageName: 'private-pkg',
                    deprecated: [],
                    unchecked: [],
                    error: 'Package private-pkg is not supported by the checker server.',
                },
                { packageName: 'my-package', deprecated: ['pytz'], unchecked: ['attrs'] },
            ]);
        });
    });
});
