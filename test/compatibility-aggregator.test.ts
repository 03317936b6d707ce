import { expect } from 'chai';
import { beforeEach, describe, it } from 'mocha';
import { CompatibilityStatus, SummaryStatus, type CompatibilityResult, type PythonVersion } from '@I/compatibility.interfaces';
import { aggregate, aggregatePackage, combineStatuses } from '@U/compatibility-aggregator.utils';
import { InMemoryCompatibilityStore } from '@S/memory-store.service';
import { result } from './helpers';

class FailingPairStore extends InMemoryCompatibilityStore {
    async getPairwiseStatus(_a: string, _b: string, _pythonVersion: PythonVersion): Promise<CompatibilityResult | undefined> {
        throw new Error('database is locked');
    }
}

class CountingStore extends InMemoryCompatibilityStore {
    selfReads = 0;
    pairReads: string[][] = [];

    async getSelfStatus(packageName: string, pythonVersion: PythonVersion): Promise<CompatibilityResult | undefined> {
        this.selfReads++;
        return super.getSelfStatus(packageName, pythonVersion);
    }

    async getPairwiseStatus(packageA: string, packageB: string, pythonVersion: PythonVersion): Promise<CompatibilityResult | undefined> {
        this.pairReads.push([packageA, packageB]);
        return super.getPairwiseStatus(packageA, packageB, pythonVersion);
    }
}

describe('Compatibility Aggregator', function () {
    let store: InMemoryCompatibilityStore;

    beforeEach(async function () {
        store = new InMemoryCompatibilityStore();
        await store.putSelfStatus(result(['six'], CompatibilityStatus.SUCCESS));
        await store.putSelfStatus(result(['Django'], CompatibilityStatus.SUCCESS));
    });

    describe('six and Django', function () {
        it('should report SUCCESS when every row succeeded', async function () {
            await store.putPairwiseStatus(result(['Django', 'six'], CompatibilityStatus.SUCCESS));

            const summaries = await aggregate(['six', 'Django'], '3', store);

            expect(summaries.get('six')?.status).to.equal(SummaryStatus.SUCCESS);
            expect(summaries.get('Django')?.status).to.equal(SummaryStatus.SUCCESS);
            expect(summaries.get('six')?.pairs).to.deep.equal([
                { otherPackage: 'Django', status: CompatibilityStatus.SUCCESS, details: null, found: true },
            ]);
        });

        it('should mark both packages CONFLICT when the pair conflicts', async function () {
            await store.putPairwiseStatus(result(['six', 'Django'], CompatibilityStatus.CONFLICT, '3', 'six==1.0 is incompatible'));

            const summaries = await aggregate(['six', 'Django'], '3', store);

            expect(summaries.get('six')?.status).to.equal(SummaryStatus.CONFLICT);
            expect(summaries.get('Django')?.status).to.equal(SummaryStatus.CONFLICT);
            expect(summaries.get('Django')?.pairs[0]).to.deep.equal({
                otherPackage: 'six',
                status: CompatibilityStatus.CONFLICT,
                details: 'six==1.0 is incompatible',
                found: true,
            });
        });

        it('should report a missing pair row as UNKNOWN, never SUCCESS', async function () {
            const summaries = await aggregate(['six', 'Django'], '3', store);

            expect(summaries.get('six')?.status).to.equal(SummaryStatus.UNKNOWN);
            expect(summaries.get('six')?.pairs).to.deep.equal([
                { otherPackage: 'Django', status: CompatibilityStatus.UNKNOWN, details: null, found: false },
            ]);
        });

        it('should read results of the requested Python version only', async function () {
            await store.putPairwiseStatus(result(['Django', 'six'], CompatibilityStatus.CONFLICT, '2'));
            await store.putPairwiseStatus(result(['Django', 'six'], CompatibilityStatus.SUCCESS, '3'));

            const summaries = await aggregate(['six', 'Django'], '3', store);

            expect(summaries.get('six')?.status).to.equal(SummaryStatus.SUCCESS);
        });
    });

    it('should fold CHECK_WARNING as a conflict', async function () {
        await store.putSelfStatus(result(['six'], CompatibilityStatus.CHECK_WARNING));

        const summaries = await aggregate(['six'], '3', store);

        expect(summaries.get('six')?.status).to.equal(SummaryStatus.CONFLICT);
        expect(summaries.get('six')?.selfStatus).to.equal(CompatibilityStatus.CHECK_WARNING);
    });

    it('should report a package without a self row as UNKNOWN', async function () {
        const summaries = await aggregate(['attrs'], '3', store);

        expect(summaries.get('attrs')).to.deep.equal({
            package: 'attrs',
            pythonVersion: '3',
            status: SummaryStatus.UNKNOWN,
            selfStatus: CompatibilityStatus.UNKNOWN,
            selfDetails: null,
            selfFound: false,
            pairs: [],
        });
    });

    it('should not depend on the order of the input packages', async function () {
        await store.putSelfStatus(result(['attrs'], CompatibilityStatus.SUCCESS));
        await store.putPairwiseStatus(result(['Django', 'six'], CompatibilityStatus.CONFLICT));
        await store.putPairwiseStatus(result(['attrs', 'six'], CompatibilityStatus.SUCCESS));

        const forward = await aggregate(['six', 'Django', 'attrs'], '3', store);
        const backward = await aggregate(['attrs', 'Django', 'six'], '3', store);

        for (const name of ['six', 'Django', 'attrs']) {
            expect(forward.get(name)).to.deep.equal(backward.get(name));
        }
    });

    it('should ignore duplicate package names', async function () {
        await store.putPairwiseStatus(result(['Django', 'six'], CompatibilityStatus.SUCCESS));

        const summaries = await aggregate(['six', 'six', 'Django'], '3', store);

        expect([...summaries.keys()]).to.deep.equal(['six', 'Django']);
        expect(summaries.get('six')?.pairs).to.have.length(1);
    });

    it('should only move towards CONFLICT as conflicting pairs are added', async function () {
        await store.putSelfStatus(result(['attrs'], CompatibilityStatus.SUCCESS));
        await store.putPairwiseStatus(result(['Django', 'six'], CompatibilityStatus.SUCCESS));
        await store.putPairwiseStatus(result(['attrs', 'six'], CompatibilityStatus.SUCCESS));
        await store.putPairwiseStatus(result(['Django', 'attrs'], CompatibilityStatus.SUCCESS));

        const before = await aggregate(['six', 'Django', 'attrs'], '3', store);
        expect(before.get('six')?.status).to.equal(SummaryStatus.SUCCESS);

        await store.putPairwiseStatus(result(['attrs', 'six'], CompatibilityStatus.CONFLICT));
        const after = await aggregate(['six', 'Django', 'attrs'], '3', store);

        expect(after.get('six')?.status).to.equal(SummaryStatus.CONFLICT);
        expect(after.get('attrs')?.status).to.equal(SummaryStatus.CONFLICT);
        expect(after.get('Django')?.status).to.equal(SummaryStatus.SUCCESS);
    });

    it('should treat a failing store read as an absent row', async function () {
        const failing = new FailingPairStore();
        await failing.putSelfStatus(result(['six'], CompatibilityStatus.SUCCESS));
        await failing.putSelfStatus(result(['Django'], CompatibilityStatus.SUCCESS));

        const summaries = await aggregate(['six', 'Django'], '3', failing);

        expect(summaries.get('six')?.status).to.equal(SummaryStatus.UNKNOWN);
        expect(summaries.get('six')?.selfFound).to.be.true;
        expect(summaries.get('six')?.pairs[0].found).to.be.false;
    });

    describe('aggregatePackage', function () {
        it('should match the package entry of a full aggregation', async function () {
            await store.putSelfStatus(result(['attrs'], CompatibilityStatus.SUCCESS));
            await store.putPairwiseStatus(result(['six', 'Django'], CompatibilityStatus.CONFLICT, '3', 'version clash'));
            await store.putPairwiseStatus(result(['six', 'attrs'], CompatibilityStatus.SUCCESS));

            const full = await aggregate(['six', 'Django', 'attrs', 'pytz'], '3', store);

            for (const name of ['six', 'Django', 'attrs', 'pytz']) {
                const others = ['six', 'Django', 'attrs', 'pytz'].filter((other) => other !== name);
                expect(await aggregatePackage(name, others, '3', store)).to.deep.equal(full.get(name));
            }
        });

        it('should read only the pairs the package is in', async function () {
            const counting = new CountingStore();

            await aggregatePackage('six', ['six', 'Django', 'attrs', 'pytz'], '3', counting);

            expect(counting.selfReads).to.equal(1);
            expect(counting.pairReads).to.deep.equal([
                ['Django', 'six'],
                ['attrs', 'six'],
                ['pytz', 'six'],
            ]);
        });
    });

    describe('combineStatuses', function () {
        it('should rank CONFLICT over UNKNOWN over SUCCESS', function () {
            const success = result(['six'], CompatibilityStatus.SUCCESS);
            const unknown = result(['six'], CompatibilityStatus.UNKNOWN);
            const conflict = result(['six'], CompatibilityStatus.CONFLICT);

            expect(combineStatuses([success, success])).to.equal(SummaryStatus.SUCCESS);
            expect(combineStatuses([success, unknown])).to.equal(SummaryStatus.UNKNOWN);
            expect(combineStatuses([success, undefined])).to.equal(SummaryStatus.UNKNOWN);
            expect(combineStatuses([unknown, conflict, undefined])).to.equal(SummaryStatus.CONFLICT);
        });
    });
});
