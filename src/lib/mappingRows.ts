import type { AggregateRow, HexColor, MatrixRow, Metric } from './types';
import { isHexColor } from './colorMapper';
import { ValidationError } from './errors';

function assertHex(color: HexColor, where: string): void {
  if (!isHexColor(color)) {
    throw new ValidationError(`Malformed color "${color}" for ${where} (expected #RRGGBB)`);
  }
}

export function createAggregateRow(
  metric: Metric,
  region: string,
  value: number,
  color: HexColor
): AggregateRow {
  assertHex(color, `${metric} region ${region}`);
  if (!Number.isFinite(value)) {
    throw new ValidationError(`Aggregate value for ${metric} region ${region} is not a number`);
  }

  return { metric, scope: 'aggregate', region, value, color };
}

/**
 * Build a matrix row, checking the invariants only matrix rows carry:
 * a group id, a non-empty range and a normalized value inside [0, 1].
 */
export function createMatrixRow(fields: Omit<MatrixRow, 'scope'>): MatrixRow {
  const where = `${fields.metric} region ${fields.region} group ${fields.group}`;
  assertHex(fields.color, where);

  if (fields.group === '') {
    throw new ValidationError(`Matrix row for ${fields.metric} region ${fields.region} has no group`);
  }
  if (!Number.isFinite(fields.value)) {
    throw new ValidationError(`Matrix value for ${where} is not a number`);
  }
  if (!(fields.vmin < fields.vmax)) {
    throw new ValidationError(`Matrix range for ${where} is empty (vmin ${fields.vmin}, vmax ${fields.vmax})`);
  }
  if (!(fields.normalizedValue >= 0 && fields.normalizedValue <= 1)) {
    throw new ValidationError(`Normalized value ${fields.normalizedValue} for ${where} is outside [0, 1]`);
  }

  return { ...fields, scope: 'matrix' };
}
