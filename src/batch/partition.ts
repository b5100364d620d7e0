import type { RowTable } from '../table/RowTable.js';
import { Batch } from './Batch.js';

export { partitionPlates } from './Plate.js';

/**
 * One Batch per distinct batch name, in first-seen order.
 */
export function partitionBatches(table: RowTable): Batch[] {
  const groups = table.groupIndices((row) => row.batchName);
  return [...groups].map(([name, indices]) => new Batch(name, table.pick(indices)));
}
