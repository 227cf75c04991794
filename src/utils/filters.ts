import { Matrix } from 'ml-matrix';

import { Candidate, CandidatePolicy } from '../types';

export function isMissingSample(positions: Matrix, index: number): boolean {
  return Number.isNaN(positions.get(index, 0)) || Number.isNaN(positions.get(index, 1));
}

/**
 * Removes the indices whose sample has a missing coordinate from every candidate.
 * Order within each candidate is preserved; candidates may become empty.
 */
export function filterCandidatesRemoveNans(candidates: Candidate[], positions: Matrix): Candidate[] {
  return candidates.map(candidate => candidate.filter(index => !isMissingSample(positions, index)));
}

/**
 * Splits every candidate where consecutive indices are not contiguous,
 * i.e. where missing samples were removed before. Empty candidates are dropped.
 */
export function eventsSplitNans(candidates: Candidate[], positions: Matrix): Candidate[] {
  const split: Candidate[] = [];

  for (const candidate of candidates) {
    let run: Candidate = [];
    for (const index of candidate) {
      // A missing sample that survived until here still breaks the run
      if (isMissingSample(positions, index)) {
        if (run.length > 0) split.push(run);
        run = [];
        continue;
      }
      if (run.length > 0 && index !== run[run.length - 1] + 1) {
        split.push(run);
        run = [];
      }
      run.push(index);
    }
    if (run.length > 0) split.push(run);
  }

  return split;
}

/**
 * Applies each policy to the output of the previous one.
 */
export function composePolicies(...policies: CandidatePolicy[]): CandidatePolicy {
  return (candidates, positions) =>
    policies.reduce((current, policy) => policy(current, positions), candidates);
}

/**
 * Missing-value handling for windows that contain NaN samples.
 *
 * With `includeNan` the window stays one candidate with only the missing samples
 * stripped; without it the candidate is also split at every gap.
 */
export function createMissingValuePolicy(includeNan: boolean): CandidatePolicy {
  return includeNan
    ? filterCandidatesRemoveNans
    : composePolicies(filterCandidatesRemoveNans, eventsSplitNans);
}
