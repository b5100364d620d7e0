import { NOT_COMPUTED } from '../types/assay.js';
import type { Computed, SampleRow } from '../types/assay.js';
import { partitionPlates } from './Plate.js';
import type { Plate } from './Plate.js';

/**
 * One instrument batch: every row sharing a batch name, split into plates.
 *
 * `date`, `qcs` and `standards` are not derived yet; they stay
 * `not-computed` until calibration and QC handling exists. `lot` is set
 * by the caller.
 */
export class Batch {
  readonly name: string;
  readonly rows: readonly Readonly<SampleRow>[];
  readonly plates: readonly Plate[];
  readonly highestValue: number | null;
  readonly date: Computed<string> = NOT_COMPUTED;
  readonly qcs: Computed<readonly Readonly<SampleRow>[]> = NOT_COMPUTED;
  readonly standards: Computed<readonly Readonly<SampleRow>[]> = NOT_COMPUTED;
  private lotValue: Computed<string> = NOT_COMPUTED;

  constructor(name: string, rows: readonly Readonly<SampleRow>[]) {
    this.name = name;
    this.rows = [...rows];
    this.highestValue = highestConcentration(this.rows);
    this.plates = partitionPlates(name, this.rows);
  }

  get lot(): Computed<string> {
    return this.lotValue;
  }

  setLot(lot: string): void {
    this.lotValue = { state: 'computed', value: lot };
  }

  plate(plateNumber: number): Plate | undefined {
    return this.plates.find((p) => p.plateNumber === plateNumber);
  }

  describe(): string {
    return `Name: ${this.name}, Plates: ${this.plates.length}, Rows: ${this.rows.length}`;
  }
}

/**
 * Maximum fg/ml concentration, or null when no row carries a value.
 */
export function highestConcentration(rows: readonly Readonly<SampleRow>[]): number | null {
  let max: number | null = null;
  for (const row of rows) {
    const value = row.concentrationFgMl;
    if (value === null) continue;
    if (max === null || value > max) max = value;
  }
  return max;
}
