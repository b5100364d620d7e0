import { describe, expect, it } from 'vitest';
import { normalizeRecords } from '../table/normalizeRecords.js';
import { rawRecord } from '../testing/records.js';
import { columnTemplate, rowTemplate } from '../template/types.js';
import { Batch } from './Batch.js';
import { partitionBatches, partitionPlates } from './partition.js';

function interleavedTable() {
  return normalizeRecords([
    rawRecord({ 'Batch Name': 'Batch-A', Location: 'Plate 1 - Well A1', Concentration: '0.5' }),
    rawRecord({ 'Batch Name': 'Batch-B', Location: 'Plate 1 - Well A1' }),
    rawRecord({ 'Batch Name': 'Batch-A', Location: 'Plate 2 - Well A1', Concentration: '2' }),
    rawRecord({ 'Batch Name': 'Batch-A', Location: 'Plate 1 - Well A2', Concentration: 'NaN' }),
    rawRecord({ 'Batch Name': 'Batch-B', Location: 'Plate 1 - Well A2' }),
    rawRecord({ 'Batch Name': 'Batch-A', Location: 'Plate 2 - Well A2', Concentration: '1' }),
    rawRecord({ 'Batch Name': 'Batch-A', Location: 'Plate 1 - Well A3' }),
  ]).table;
}

describe('partitionBatches', () => {
  it('builds one batch per name and one plate per plate number', () => {
    const table = interleavedTable();
    const batches = partitionBatches(table);

    expect(batches.map((b) => b.name)).toEqual(['Batch-A', 'Batch-B']);

    const [batchA, batchB] = batches;
    expect(batchA?.plates.map((p) => p.plateNumber)).toEqual([1, 2]);
    expect(batchA?.plates.map((p) => p.wellCount)).toEqual([3, 2]);
    expect(batchB?.plates.map((p) => p.plateNumber)).toEqual([1]);
    expect(batchB?.plates.map((p) => p.wellCount)).toEqual([2]);

    const batchRowTotal = batches.reduce((sum, b) => sum + b.rows.length, 0);
    const plateRowTotal = batches.reduce(
      (sum, b) => sum + b.plates.reduce((inner, p) => inner + p.wellCount, 0),
      0,
    );
    expect(batchRowTotal).toBe(table.size);
    expect(plateRowTotal).toBe(table.size);
  });

  it('keeps rows of a plate in table order', () => {
    const [batchA] = partitionBatches(interleavedTable());
    expect(batchA?.plate(1)?.rows.map((r) => r.column)).toEqual([1, 2, 3]);
  });

  it('gives each batch and plate its own rows', () => {
    const [batchA, batchB] = partitionBatches(interleavedTable());
    const plateA1 = batchA?.plate(1);
    if (!plateA1) throw new Error('missing plate');

    plateA1.applyTemplates({
      dilution: rowTemplate([['A', 10]]),
      feeders: columnTemplate([[1, 'FeederOne']]),
      replicate: columnTemplate([[1, 1]]),
    });

    expect(plateA1.rows[0]?.dilution).toEqual({ status: 'assigned', value: 10 });
    expect(batchB?.plate(1)?.rows[0]?.dilution).toEqual({ status: 'unset' });
    expect(batchA?.plate(2)?.rows[0]?.dilution).toEqual({ status: 'unset' });
    expect(Object.keys(batchA?.rows[0] ?? {})).not.toContain('dilution');
  });

  it('returns an empty list for an empty table', () => {
    expect(partitionBatches(normalizeRecords([]).table)).toEqual([]);
  });
});

describe('partitionPlates', () => {
  it('labels plates with the batch name', () => {
    const rows = interleavedTable().all().filter((r) => r.batchName === 'Batch-B');
    const plates = partitionPlates('Batch-B', rows);
    expect(plates).toHaveLength(1);
    expect(plates[0]?.toString()).toBe('Batch: Batch-B, Plate Number: 1');
  });
});

describe('Batch', () => {
  it('derives the highest fg/ml concentration', () => {
    const [batchA, batchB] = partitionBatches(interleavedTable());
    expect(batchA?.highestValue).toBe(2000);
    expect(batchB?.highestValue).toBeNull();
  });

  it('handles an empty batch', () => {
    const batch = new Batch('empty', []);
    expect(batch.highestValue).toBeNull();
    expect(batch.plates).toEqual([]);
    expect(batch.describe()).toBe('Name: empty, Plates: 0, Rows: 0');
  });

  it('leaves calibration placeholders not computed until set', () => {
    const [batchA] = partitionBatches(interleavedTable());
    if (!batchA) throw new Error('missing batch');

    expect(batchA.date).toEqual({ state: 'not-computed' });
    expect(batchA.qcs).toEqual({ state: 'not-computed' });
    expect(batchA.standards).toEqual({ state: 'not-computed' });
    expect(batchA.lot).toEqual({ state: 'not-computed' });

    batchA.setLot('LOT-42');
    expect(batchA.lot).toEqual({ state: 'computed', value: 'LOT-42' });
    expect(batchA.describe()).toBe('Name: Batch-A, Plates: 2, Rows: 5');
  });
});
