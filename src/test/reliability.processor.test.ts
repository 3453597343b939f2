import { describe, test, beforeEach, afterEach, expect } from 'vitest';
import { SQLiteDatabase } from '../db/database.js';
import { applyMigrations } from '../db/migrations.js';
import { DatabaseProjectStore } from '../db/project-store.js';
import {
  RELIABILITY_DOCUMENT,
  ReliabilityProcessor,
  computeReliability,
  selectUsableObservations,
} from '../processors/reliability.processor.js';
import type { Observation } from '../types/reliability.types.js';
import { MemoryProjectStore } from './fakes.js';

// Two coders on items 1-3, a lone coder on item 4
const CSV = [
  'content_id,coder_id,frame',
  '1,c1,A',
  '1,c2,A',
  '2,c1,A',
  '2,c2,B',
  '3,c1,B',
  '3,c2,B',
  '4,c1,A',
].join('\n');

describe('selectUsableObservations', () => {
  test('keeps the first observation per coder and skips single-coder items', () => {
    const observations: Observation[] = [
      { contentId: '1', coderId: 'c1', values: { frame: 'A', tone: 'calm' } },
      { contentId: '1', coderId: 'c1', values: { frame: 'B' } },
      { contentId: '1', coderId: 'c2', values: { frame: 'A' } },
      { contentId: '2', coderId: 'c1', values: { frame: 'A' } },
    ];

    const selection = selectUsableObservations(observations, ['frame']);

    expect(selection.observations).toEqual([
      { contentId: '1', coderId: 'c1', values: { frame: 'A' } },
      { contentId: '1', coderId: 'c2', values: { frame: 'A' } },
    ]);
    expect(selection.usedContentIds).toEqual(['1']);
    expect(selection.skippedContentIds).toEqual(['2']);
    expect(selection.warnings).toEqual(['Content "2" has only one coder, skipping']);
  });
});

describe('computeReliability', () => {
  test('fails with fewer than two usable observations', () => {
    const outcome = computeReliability([{ contentId: '1', coderId: 'c1', values: { frame: 'A' } }], ['frame']);
    expect(outcome).toEqual({
      ok: false,
      error: { kind: 'insufficient_observations', message: 'Not enough observations to calculate reliability' },
    });
  });

  test('warns and omits kappa with more than two coders', () => {
    const observations: Observation[] = ['c1', 'c2', 'c3'].map(coderId => ({
      contentId: '1',
      coderId,
      values: { frame: 'A' },
    }));

    const outcome = computeReliability(observations, ['frame'], ['holsti', 'cohens_kappa']);

    expect(outcome.ok && outcome.value.results).toEqual({ holsti: 1 });
    expect(outcome.ok && outcome.value.warnings).toEqual(["Cohen's kappa needs exactly two coders, skipped"]);
  });
});

describe('ReliabilityProcessor', () => {
  let db: SQLiteDatabase;
  let processor: ReliabilityProcessor;

  beforeEach(async () => {
    db = new SQLiteDatabase(':memory:');
    await applyMigrations(db);
    processor = new ReliabilityProcessor(new DatabaseProjectStore(db));
  });

  afterEach(async () => {
    await db.close();
  });

  test('imports and stores a dataset', async () => {
    const outcome = await processor.importDataset('survey', CSV, 'csv');

    expect(outcome.ok && outcome.value.observations).toHaveLength(7);
    expect(outcome.ok && outcome.value.variables).toEqual(['frame']);

    const stored = await processor.loadDataset('survey');
    expect(stored?.observations).toHaveLength(7);
    expect(stored?.results).toBeUndefined();
  });

  test('returns import errors without storing anything', async () => {
    const outcome = await processor.importDataset('survey', 'frame\nA', 'csv');

    expect(!outcome.ok && outcome.error.kind).toBe('invalid_import');
    expect(await processor.loadDataset('survey')).toBeNull();
  });

  test('calculates the requested methods and stores the results', async () => {
    await processor.importDataset('survey', CSV, 'csv');

    const outcome = await processor.calculate('survey', {
      methods: ['percent_agreement', 'krippendorff_alpha', 'cohens_kappa', 'scotts_pi'],
    });

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    const { results } = outcome.value;
    expect(results.percent_agreement).toBeCloseTo(2 / 3, 10);
    expect(results.krippendorff_alpha).toBeCloseTo(-0.2, 10);
    expect(results.cohens_kappa).toBeCloseTo(0.4, 10);
    expect(results.scotts_pi).toBeCloseTo(1 / 3, 10);
    expect(outcome.value.usedContentIds).toEqual(['1', '2', '3']);
    expect(outcome.value.skippedContentIds).toEqual(['4']);
    expect(outcome.value.observationCount).toBe(6);
    expect(outcome.value.warnings).toEqual(['Content "4" has only one coder, skipping']);

    const stored = await processor.loadDataset('survey');
    expect(stored?.results).toEqual(results);
    expect(typeof stored?.calculatedAt).toBe('string');
  });

  test('defaults to percentage agreement and alpha', async () => {
    await processor.importDataset('survey', CSV, 'csv');

    const outcome = await processor.calculate('survey');

    expect(outcome.ok && Object.keys(outcome.value.results)).toEqual(['percent_agreement', 'krippendorff_alpha']);
  });

  test('requires an imported dataset', async () => {
    expect(await processor.calculate('survey')).toEqual({
      ok: false,
      error: { kind: 'dataset_missing', message: 'Import coding data before calculating reliability' },
    });
  });

  test('rejects unknown variables and empty method lists', async () => {
    await processor.importDataset('survey', CSV, 'csv');

    const noVariables = await processor.calculate('survey', { variables: ['tone'] });
    const noMethods = await processor.calculate('survey', { methods: [] });

    expect(!noVariables.ok && noVariables.error.message).toBe('Select at least one variable');
    expect(!noMethods.ok && noMethods.error.message).toBe('Select at least one calculation method');
  });

  test('fails when only one coder contributed', async () => {
    await processor.importDataset('survey', 'content_id,coder_id,frame\n1,c1,A\n2,c1,B', 'csv');

    const outcome = await processor.calculate('survey');

    expect(!outcome.ok && outcome.error.kind).toBe('insufficient_observations');
  });

  test('imports JSON records', async () => {
    const source = JSON.stringify([
      { content_id: 'post-1', coder_id: 'c1', variables: { frame: 'A' } },
      { content_id: 'post-1', coder_id: 'c2', variables: { frame: 'A' } },
    ]);

    await processor.importDataset('survey', source, 'json');
    const outcome = await processor.calculate('survey', { methods: ['percent_agreement'] });

    expect(outcome.ok && outcome.value.results).toEqual({ percent_agreement: 1 });
  });
});

describe('ReliabilityProcessor storage failures', () => {
  test('reports a failed save on import', async () => {
    const store = new MemoryProjectStore();
    store.failSaves = true;

    const outcome = await new ReliabilityProcessor(store).importDataset('survey', CSV, 'csv');

    expect(outcome).toEqual({
      ok: false,
      error: { kind: 'storage_error', message: 'Could not save the imported dataset' },
    });
  });

  test('ignores a malformed stored dataset', async () => {
    const store = new MemoryProjectStore();
    await store.save('survey', RELIABILITY_DOCUMENT, { observations: 'broken' });

    expect(await new ReliabilityProcessor(store).loadDataset('survey')).toBeNull();
  });
});
