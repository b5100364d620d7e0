import { applyTemplate } from '../template/applyTemplate.js';
import type { TemplateSet } from '../template/types.js';
import { groupIndices } from '../table/RowTable.js';
import type { DesignField, DesignValue, PlateRow, SampleRow } from '../types/assay.js';

const UNSET: DesignValue = Object.freeze({ status: 'unset' });

export type DesignCounts = Record<DesignValue['status'], number>;

/**
 * A single assay plate within a batch.
 *
 * The plate owns its rows: each one is a copy of the batch row extended
 * with dilution, feeder and replicate fields, which start out unset.
 */
export class Plate {
  readonly batchName: string;
  readonly plateNumber: number;
  readonly rows: PlateRow[];

  constructor(batchName: string, plateNumber: number, rows: readonly Readonly<SampleRow>[]) {
    this.batchName = batchName;
    this.plateNumber = plateNumber;
    this.rows = rows.map((row) => ({
      ...row,
      dilution: UNSET,
      feeders: UNSET,
      replicate: UNSET,
    }));
  }

  get wellCount(): number {
    return this.rows.length;
  }

  findWell(row: string, column: number): PlateRow | undefined {
    return this.rows.find((r) => r.row === row && r.column === column);
  }

  applyTemplates(templates: TemplateSet): void {
    applyTemplate(this, templates.dilution, templates.feeders, templates.replicate);
  }

  designSummary(): Record<DesignField, DesignCounts> {
    const summary: Record<DesignField, DesignCounts> = {
      dilution: { unset: 0, unassigned: 0, assigned: 0 },
      feeders: { unset: 0, unassigned: 0, assigned: 0 },
      replicate: { unset: 0, unassigned: 0, assigned: 0 },
    };
    for (const row of this.rows) {
      summary.dilution[row.dilution.status] += 1;
      summary.feeders[row.feeders.status] += 1;
      summary.replicate[row.replicate.status] += 1;
    }
    return summary;
  }

  toString(): string {
    return `Batch: ${this.batchName}, Plate Number: ${this.plateNumber}`;
  }
}

/**
 * One Plate per distinct plate number within a batch, in first-seen order.
 */
export function partitionPlates(batchName: string, rows: readonly Readonly<SampleRow>[]): Plate[] {
  const groups = groupIndices(rows, (row) => row.plate);
  return [...groups].map(([plateNumber, indices]) => {
    const plateRows: Readonly<SampleRow>[] = [];
    for (const index of indices) {
      const row = rows[index];
      if (row !== undefined) plateRows.push(row);
    }
    return new Plate(batchName, plateNumber, plateRows);
  });
}
