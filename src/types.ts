import { Matrix } from 'ml-matrix';

/**
 * Anything that reshapes to an (N, 2) position series.
 * Flat arrays are read row-major: [x0, y0, x1, y1, ...].
 */
export type PositionsInput =
  | Matrix
  | ReadonlyArray<ReadonlyArray<number>>
  | ReadonlyArray<number>
  | Float64Array;

// Ordered sample indices of one provisional fixation
export type Candidate = number[];

/**
 * Rewrites a list of candidates against the full position series,
 * e.g. to drop missing samples or split at gaps.
 */
export type CandidatePolicy = (candidates: Candidate[], positions: Matrix) => Candidate[];

export interface IdtOptions {
  timesteps?: ReadonlyArray<number> | Float64Array | null;
  minimumDuration: number;      // Same unit as timesteps (samples when omitted)
  dispersionThreshold: number;
  includeNan: boolean;
  name: string;
  missingValuePolicy?: CandidatePolicy;
}

export interface EventRecord {
  name: string;
  onset: number;
  offset: number;
  duration: number;
}
