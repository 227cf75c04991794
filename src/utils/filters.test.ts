import { Matrix } from 'ml-matrix';

import {
  isMissingSample,
  filterCandidatesRemoveNans,
  eventsSplitNans,
  composePolicies,
  createMissingValuePolicy
} from './filters';
import { Candidate } from '../types';

const positions = new Matrix([
  [0, 0],
  [0, 0],
  [NaN, NaN],
  [0, 0],
  [0, 0],
  [1, NaN],
  [1, 1],
]);

describe('isMissingSample', () => {
  test('treats a sample with any missing coordinate as missing', () => {
    expect(isMissingSample(positions, 0)).toBe(false);
    expect(isMissingSample(positions, 2)).toBe(true);
    expect(isMissingSample(positions, 5)).toBe(true);
  });
});

describe('filterCandidatesRemoveNans', () => {
  test('strips missing samples and keeps the order', () => {
    expect(filterCandidatesRemoveNans([[0, 1, 2, 3, 4]], positions)).toEqual([[0, 1, 3, 4]]);
    expect(filterCandidatesRemoveNans([[3, 4, 5, 6], [2]], positions)).toEqual([[3, 4, 6], []]);
  });

  test('does not modify the given candidates', () => {
    const candidates: Candidate[] = [[0, 1, 2]];
    filterCandidatesRemoveNans(candidates, positions);
    expect(candidates).toEqual([[0, 1, 2]]);
  });
});

describe('eventsSplitNans', () => {
  test('splits at gaps left by removed samples', () => {
    expect(eventsSplitNans([[0, 1, 3, 4]], positions)).toEqual([[0, 1], [3, 4]]);
    expect(eventsSplitNans([[0, 1, 3, 4, 6]], positions)).toEqual([[0, 1], [3, 4], [6]]);
  });

  test('splits at missing samples still in the candidate', () => {
    expect(eventsSplitNans([[0, 1, 2, 3]], positions)).toEqual([[0, 1], [3]]);
  });

  test('keeps contiguous candidates whole and drops empty ones', () => {
    expect(eventsSplitNans([[0, 1], [], [3, 4]], positions)).toEqual([[0, 1], [3, 4]]);
  });
});

describe('composePolicies', () => {
  test('applies policies left to right', () => {
    const dropFirst = (candidates: Candidate[]) => candidates.map(c => c.slice(1));
    const policy = composePolicies(filterCandidatesRemoveNans, dropFirst);
    expect(policy([[0, 1, 2, 3]], positions)).toEqual([[1, 3]]);
  });
});

describe('createMissingValuePolicy', () => {
  test('keeps the candidate whole when missing samples are included', () => {
    const policy = createMissingValuePolicy(true);
    expect(policy([[0, 1, 2, 3, 4]], positions)).toEqual([[0, 1, 3, 4]]);
  });

  test('splits the candidate at gaps otherwise', () => {
    const policy = createMissingValuePolicy(false);
    expect(policy([[0, 1, 2, 3, 4]], positions)).toEqual([[0, 1], [3, 4]]);
  });
});
