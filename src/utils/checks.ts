import { Matrix } from 'ml-matrix';

import { PositionsInput } from '../types';
import { LengthMismatchError, ShapeError, ValueError } from '../errors';

function isFlatSeries(input: ReadonlyArray<ReadonlyArray<number>> | ReadonlyArray<number> | Float64Array): input is ReadonlyArray<number> | Float64Array {
  return input instanceof Float64Array || input.length === 0 || typeof input[0] === 'number';
}

/**
 * Reads a position series into an (N, 2) matrix. Matrices with two columns are used as-is,
 * row arrays are copied, flat arrays are reshaped row-major.
 */
export function toPositionMatrix(positions: PositionsInput): Matrix {
  if (positions instanceof Matrix) {
    if (positions.columns !== 2) {
      throw new ShapeError(`positions must be of shape (N, 2) but have shape (${positions.rows}, ${positions.columns})`);
    }
    if (positions.rows === 0) {
      throw new ShapeError('positions must contain at least one sample');
    }
    return positions;
  }

  if (positions.length === 0) {
    throw new ShapeError('positions must contain at least one sample');
  }

  if (isFlatSeries(positions)) {
    if (positions.length % 2 !== 0) {
      throw new ShapeError(`flat positions of length ${positions.length} cannot be reshaped to (N, 2)`);
    }
    return Matrix.from1DArray(positions.length / 2, 2, Array.from(positions));
  }

  const rows: number[][] = [];
  positions.forEach((row, i) => {
    if (typeof row === 'number' || row.length !== 2) {
      const width = typeof row === 'number' ? 'a scalar' : `${row.length} values`;
      throw new ShapeError(`positions must be of shape (N, 2) but row ${i} has ${width}`);
    }
    rows.push([row[0], row[1]]);
  });
  return new Matrix(rows);
}

/**
 * Throws if the named series do not all share one length.
 */
export function checkIsLengthMatching(series: Record<string, { length: number }>): void {
  const entries = Object.entries(series);
  if (entries.length < 2) return;

  const [firstKey, first] = entries[0];
  for (const [key, value] of entries.slice(1)) {
    if (value.length !== first.length) {
      throw new LengthMismatchError(
        `The sequences "${firstKey}" and "${key}" must be of equal length, ` +
        `but are ${first.length} and ${value.length}`
      );
    }
  }
}

/**
 * Returns integral timesteps for N samples, defaulting to the sample index.
 */
export function toTimesteps(timesteps: ReadonlyArray<number> | Float64Array | null | undefined, numSamples: number): number[] {
  if (timesteps == null) {
    return Array.from({ length: numSamples }, (_, i) => i);
  }

  const values = Array.from(timesteps);
  checkIsLengthMatching({ positions: { length: numSamples }, timesteps: values });

  for (const value of values) {
    if (!Number.isInteger(value)) {
      throw new TypeError(`timesteps must be of type int but contain ${value}`);
    }
  }
  return values;
}

/**
 * Constant interval between consecutive timesteps. A single sample has no interval; 1 is assumed.
 */
export function inferSampleInterval(timesteps: ReadonlyArray<number>): number {
  if (timesteps.length < 2) return 1;

  const interval = timesteps[1] - timesteps[0];
  for (let i = 2; i < timesteps.length; i++) {
    if (timesteps[i] - timesteps[i - 1] !== interval) {
      throw new ValueError('interval between timesteps must be constant');
    }
  }
  if (interval <= 0) {
    throw new ValueError(`timesteps must be strictly increasing but have interval ${interval}`);
  }
  return interval;
}

/**
 * Converts a duration in timestep units into a number of samples.
 */
export function toSampleDuration(minimumDuration: number, interval: number): number {
  if (minimumDuration % interval !== 0) {
    throw new ValueError(
      'minimum_duration must be divisible by the constant interval between timesteps ' +
      `(${minimumDuration} is not divisible by ${interval})`
    );
  }

  const sampleDuration = minimumDuration / interval;
  if (sampleDuration < 2) {
    throw new ValueError('minimum_duration must be longer than the equivalent of 2 samples');
  }
  return sampleDuration;
}
