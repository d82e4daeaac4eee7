import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { AuthError, DataError, NotFoundError, TransientError, calculateCommission } from '@commission-sync/shared';
import { runCycle } from '../src/cycle';
import { ghlOpportunitySchema } from '../src/ghl-schemas';
import { toOpportunityRecord, type GhlOpportunityRecord } from '../src/map-opportunity';
import { describeResult, reconcile, reconcileAll, reconcileById, type UpdaterDeps } from '../src/reconcile';
import { FakeCrm, LOAN_FIELD, byPath, loanField } from './fake-crm';

function depsFor(crm: FakeCrm, commissionRate = 0.1): UpdaterDeps {
  return {
    api: crm.api(),
    config: { commissionRate, loanAmountFieldKey: LOAN_FIELD, opportunityStatus: 'open' },
  };
}

function record(input: Record<string, unknown>, pipelineId = 'p1'): GhlOpportunityRecord {
  return toOpportunityRecord(ghlOpportunitySchema.parse(input), pipelineId, LOAN_FIELD);
}

describe('reconcile', () => {
  it('writes loan amount * rate when the value differs', async () => {
    const crm = new FakeCrm().addPipeline('p1', [{ id: 'opp1', monetaryValue: 500 }]);
    const result = await reconcile(
      depsFor(crm),
      record({ id: 'opp1', pipelineId: 'p1', monetaryValue: 500, customFields: [loanField(200000)] })
    );
    assert.deepEqual(result, { status: 'updated', opportunityId: 'opp1', previousValue: 500, value: 20000 });
    const puts = crm.updates();
    assert.equal(puts.length, 1);
    assert.equal(puts[0].path, '/pipelines/p1/opportunities/opp1');
    assert.deepEqual(puts[0].body, { monetaryValue: 20000 });
  });

  it('skips without writing when the value is already correct', async () => {
    const crm = new FakeCrm();
    const result = await reconcile(
      depsFor(crm),
      record({ id: 'opp1', monetaryValue: 20000, customFields: [loanField(200000)] })
    );
    assert.deepEqual(result, { status: 'skipped', opportunityId: 'opp1', reason: 'unchanged', value: 20000 });
    assert.equal(crm.calls.length, 0);
  });

  it('treats a value within the same cent as equal', async () => {
    const crm = new FakeCrm();
    const result = await reconcile(
      depsFor(crm, 0.015),
      record({ id: 'opp1', monetaryValue: '1500.001', customFields: [loanField('$100,000')] })
    );
    assert.equal(result.status, 'skipped');
    assert.equal(crm.calls.length, 0);
  });

  it('skips records with a zero loan amount', async () => {
    const crm = new FakeCrm();
    const result = await reconcile(depsFor(crm), record({ id: 'opp1', monetaryValue: 7, customFields: [loanField(0)] }));
    assert.deepEqual(result, { status: 'skipped', opportunityId: 'opp1', reason: 'no-loan-amount', value: 7 });
    assert.equal(crm.calls.length, 0);
  });

  it('throws DataError when the loan amount cannot be read', async () => {
    const crm = new FakeCrm();
    await assert.rejects(
      reconcile(depsFor(crm), record({ id: 'opp1', customFields: [loanField('call me')] })),
      (err: unknown) => err instanceof DataError && err.opportunityId === 'opp1'
    );
    assert.equal(crm.calls.length, 0);
  });

  it('throws TransientError when the write fails', async () => {
    const crm = new FakeCrm()
      .addPipeline('p1', [{ id: 'opp1' }])
      .failWhen(byPath('PUT', '/pipelines/p1/opportunities/opp1'), { status: 500 });
    await assert.rejects(
      reconcile(depsFor(crm), record({ id: 'opp1', customFields: [loanField(1000)] })),
      TransientError
    );
  });

  it('satisfies value == round(loan * rate) after every update', async () => {
    const cases: Array<[number, number]> = [
      [200000, 0.1],
      [123456.78, 0.015],
      [99999.99, 0.025],
      [1234.5, 0.01],
    ];
    for (const [loan, rate] of cases) {
      const crm = new FakeCrm().addPipeline('p1', [{ id: 'opp' }]);
      const result = await reconcile(depsFor(crm, rate), record({ id: 'opp', customFields: [loanField(loan)] }));
      assert.equal(result.status, 'updated');
      assert.equal(crm.find('opp')?.monetaryValue, calculateCommission(loan, rate));
    }
  });
});

describe('reconcileAll', () => {
  it('keeps going after a record fails', async () => {
    const crm = new FakeCrm()
      .addPipeline('p1', [{ id: 'r1' }, { id: 'r2' }, { id: 'r3' }, { id: 'r4' }])
      .failWhen(byPath('PUT', '/pipelines/p1/opportunities/r2'), { status: 503 });
    const records = ['r1', 'r2', 'r3', 'r4'].map((id) =>
      record({ id, monetaryValue: 0, customFields: [loanField(1000)] })
    );

    const totals = await reconcileAll(depsFor(crm), records);
    assert.deepEqual(totals, { fetched: 4, updated: 3, skipped: 0, failed: 1 });
    assert.deepEqual(
      crm.updates().map((c) => c.path.split('/').pop()),
      ['r1', 'r2', 'r3', 'r4']
    );
  });

  it('counts unreadable loan amounts as failures without writing', async () => {
    const crm = new FakeCrm().addPipeline('p1', [{ id: 'ok' }]);
    const totals = await reconcileAll(depsFor(crm), [
      record({ id: 'bad' }),
      record({ id: 'ok', monetaryValue: 0, customFields: [loanField(500)] }),
      record({ id: 'same', monetaryValue: 50, customFields: [loanField(500)] }),
    ]);
    assert.deepEqual(totals, { fetched: 3, updated: 1, skipped: 1, failed: 1 });
  });

  it('stops on a rejected credential', async () => {
    const crm = new FakeCrm()
      .addPipeline('p1', [{ id: 'r1' }, { id: 'r2' }])
      .failWhen((c) => c.method === 'PUT', { status: 401 });
    const records = ['r1', 'r2'].map((id) => record({ id, customFields: [loanField(1000)] }));
    await assert.rejects(reconcileAll(depsFor(crm), records), AuthError);
    assert.equal(crm.updates().length, 1);
  });
});

describe('runCycle', () => {
  it('updates only what differs and is idempotent across cycles', async () => {
    const crm = new FakeCrm().addPipeline('p1', [
      { id: 'opp1', monetaryValue: 500, customFields: [loanField(100000)] },
      { id: 'opp2', monetaryValue: 25000, customFields: [loanField(250000)] },
      { id: 'opp3', monetaryValue: 0, customFields: [] },
    ]);
    const deps = depsFor(crm);

    const first = await runCycle(deps);
    assert.deepEqual(
      { fetched: first.fetched, updated: first.updated, skipped: first.skipped, failed: first.failed },
      { fetched: 3, updated: 1, skipped: 1, failed: 1 }
    );
    assert.equal(crm.find('opp1')?.monetaryValue, 10000);

    const second = await runCycle(deps);
    assert.equal(second.updated, 0);
    assert.equal(second.skipped, 2);
    assert.equal(crm.updates().length, 1);
  });

  it('propagates a fetch failure so the loop can skip the cycle', async () => {
    const crm = new FakeCrm().failWhen(byPath('GET', '/pipelines/'), { throws: new Error('ETIMEDOUT') });
    await assert.rejects(runCycle(depsFor(crm)), TransientError);
  });
});

describe('reconcileById', () => {
  it('reconciles one opportunity twice with a single write', async () => {
    const crm = new FakeCrm().addPipeline('p1', [
      { id: 'opp1', monetaryValue: 1, status: 'open', customFields: [loanField(200000)] },
    ]);
    const deps = depsFor(crm);

    const first = await reconcileById(deps, { opportunityId: 'opp1', pipelineId: 'p1' });
    const second = await reconcileById(deps, { opportunityId: 'opp1', pipelineId: 'p1' });
    assert.equal(first.status, 'updated');
    assert.deepEqual(second, { status: 'skipped', opportunityId: 'opp1', reason: 'unchanged', value: 20000 });
    assert.equal(crm.updates().length, 1);
    assert.deepEqual(crm.updates()[0].body, { monetaryValue: 20000, status: 'open' });
  });

  it('prefers a readable loan amount from the webhook payload', async () => {
    const crm = new FakeCrm().addPipeline('p1', [{ id: 'opp1', monetaryValue: 0, customFields: [loanField(1000)] }]);
    const result = await reconcileById(depsFor(crm), { opportunityId: 'opp1', pipelineId: 'p1', loanAmount: '$50,000' });
    assert.equal(result.status, 'updated');
    assert.equal(result.value, 5000);
  });

  it('ignores an unreadable webhook loan amount', async () => {
    const crm = new FakeCrm().addPipeline('p1', [{ id: 'opp1', monetaryValue: 0, customFields: [loanField(1000)] }]);
    const result = await reconcileById(depsFor(crm), { opportunityId: 'opp1', pipelineId: 'p1', loanAmount: 'pending' });
    assert.equal(result.value, 100);
  });

  it('throws NotFoundError for an unknown opportunity', async () => {
    const crm = new FakeCrm().addPipeline('p1', []);
    await assert.rejects(reconcileById(depsFor(crm), { opportunityId: 'nope' }), NotFoundError);
  });
});

describe('describeResult', () => {
  it('summarises each outcome', () => {
    assert.equal(
      describeResult({ status: 'updated', opportunityId: 'o', previousValue: 0, value: 20000 }),
      'Updated value to 20000.00'
    );
    assert.equal(
      describeResult({ status: 'skipped', opportunityId: 'o', reason: 'unchanged', value: 1 }),
      'No update needed (value already correct)'
    );
    assert.equal(
      describeResult({ status: 'skipped', opportunityId: 'o', reason: 'no-loan-amount', value: 0 }),
      'Skipped: no loan amount'
    );
  });
});
