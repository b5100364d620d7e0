import type { Plate } from '../batch/Plate.js';
import type { DesignValue, TemplateLabel, WellLocation } from '../types/assay.js';
import type { Template } from './types.js';

const UNASSIGNED: DesignValue = Object.freeze({ status: 'unassigned' });

function toDesignValue(label: TemplateLabel | undefined): DesignValue {
  return label === undefined ? UNASSIGNED : { status: 'assigned', value: label };
}

/**
 * Build a lookup for one template. The axis is checked once here rather
 * than per well.
 */
export function templateResolver(template: Template): (well: WellLocation) => DesignValue {
  if (template.axis === 'row') {
    const { assignments } = template;
    return (well) => toDesignValue(assignments.get(well.row));
  }
  const { assignments } = template;
  return (well) => toDesignValue(assignments.get(well.column));
}

/**
 * Annotate every row of a plate with its dilution, feeder and replicate.
 * Each template is resolved against its own axis. Only the plate's own
 * rows are written.
 */
export function applyTemplate(plate: Plate, dilution: Template, feeders: Template, replicate: Template): void {
  const resolveDilution = templateResolver(dilution);
  const resolveFeeders = templateResolver(feeders);
  const resolveReplicate = templateResolver(replicate);

  for (const row of plate.rows) {
    row.dilution = resolveDilution(row);
    row.feeders = resolveFeeders(row);
    row.replicate = resolveReplicate(row);
  }
}
