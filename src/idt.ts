import { Matrix } from 'ml-matrix';

import EventFrame from './EventFrame';
import { Candidate, IdtOptions, PositionsInput } from './types';
import { ValueError } from './errors';
import { DispersionBounds } from './utils/dispersion';
import { createMissingValuePolicy, isMissingSample } from './utils/filters';
import {
  toPositionMatrix,
  toTimesteps,
  inferSampleInterval,
  toSampleDuration
} from './utils/checks';
import { logger } from './utils/logger';

// Defaults follow Salvucci & Goldberg (2000)
export const DEFAULT_IDT_OPTIONS: IdtOptions = {
  timesteps: null,
  minimumDuration: 100,
  dispersionThreshold: 1.0,
  includeNan: false,
  name: 'fixation',
};

function hasMissingSamples(positions: Matrix, start: number, end: number): boolean {
  for (let i = start; i < end; i++) {
    if (isMissingSample(positions, i)) return true;
  }
  return false;
}

/**
 * Fixation identification based on dispersion threshold (I-DT).
 *
 * Consecutive samples are grouped into a window that starts at the minimum
 * fixation duration. If the window's dispersion is at most the threshold it is
 * a fixation and is grown until the dispersion reaches the threshold; otherwise
 * the window start moves one sample forward.
 *
 * Windows containing missing samples are passed through the missing-value
 * policy: missing samples are stripped, and unless `includeNan` is set the
 * window is split at every gap. Every resulting candidate shorter than the
 * minimum duration is dropped.
 *
 * @param positions - (N, 2) position series, NaN marking missing values
 * @param options - Merged over {@link DEFAULT_IDT_OPTIONS}
 * @returns One row per detected fixation, in scan order
 *
 * @throws ShapeError if positions cannot be read as (N, 2)
 * @throws LengthMismatchError if timesteps and positions differ in length
 * @throws TypeError if timesteps or minimumDuration are not integers
 * @throws ValueError for non-positive thresholds, non-uniform sampling, or a
 *   minimum duration that does not map onto at least 2 whole samples
 */
export function idt(positions: PositionsInput, options: Partial<IdtOptions> = {}): EventFrame {
  const {
    timesteps: rawTimesteps,
    minimumDuration,
    dispersionThreshold,
    includeNan,
    name,
    missingValuePolicy,
  } = { ...DEFAULT_IDT_OPTIONS, ...options };

  const positionMatrix = toPositionMatrix(positions);
  const numSamples = positionMatrix.rows;
  const timesteps = toTimesteps(rawTimesteps, numSamples);

  if (!(dispersionThreshold > 0)) {
    throw new ValueError('dispersion_threshold must be greater than 0');
  }
  if (!(minimumDuration > 0)) {
    throw new ValueError('minimum_duration must be greater than 0');
  }
  if (!Number.isInteger(minimumDuration)) {
    throw new TypeError(`minimum_duration must be of type int but is ${minimumDuration}`);
  }

  // Window sizes are counted in samples, so the duration has to map onto whole samples.
  const interval = inferSampleInterval(timesteps);
  const minimumSampleDuration = toSampleDuration(minimumDuration, interval);

  const policy = missingValuePolicy ?? createMissingValuePolicy(includeNan);

  const onsets: number[] = [];
  const offsets: number[] = [];

  let winStart = 0;
  let winEnd = minimumSampleDuration;

  while (winStart < numSamples && winEnd <= numSamples) {
    // Extend the window to at least the minimum duration, without running past the data.
    winEnd = Math.max(winStart + minimumSampleDuration, winEnd);
    winEnd = Math.min(winEnd, numSamples);
    if (winEnd - winStart < minimumSampleDuration) {
      break;
    }

    // Bounds of [winStart, winEnd), extended sample by sample while the window grows
    const bounds = new DispersionBounds().addRows(positionMatrix, winStart, winEnd);

    if (bounds.value <= dispersionThreshold) {
      // Grow until the dispersion reaches the threshold or the data ends
      while (bounds.value < dispersionThreshold) {
        if (winEnd === numSamples) {
          break;
        }
        bounds.add(positionMatrix.get(winEnd, 0), positionMatrix.get(winEnd, 1));
        winEnd += 1;
      }

      if (hasMissingSamples(positionMatrix, winStart, winEnd - 1)) {
        // Same span as an event without missing samples: onset at winStart, offset at winEnd - 1
        const window: Candidate = [];
        for (let i = winStart; i < winEnd; i++) window.push(i);

        const candidates = policy([window], positionMatrix)
          .filter(candidate => candidate.length >= minimumSampleDuration);

        if (candidates.length > 1) {
          logger.warn(
            `idt: window [${timesteps[winStart]}, ${timesteps[winEnd - 1]}] split into ${candidates.length} events at missing samples`
          );
        }

        for (const candidate of candidates) {
          onsets.push(timesteps[candidate[0]]);
          offsets.push(timesteps[candidate[candidate.length - 1]]);
        }
      } else {
        onsets.push(timesteps[winStart]);
        offsets.push(timesteps[winEnd - 1]);
      }

      // Continue behind the consumed window
      winStart = winEnd;
    } else {
      winStart += 1;
    }
  }

  logger.debug(
    `idt: ${onsets.length} ${name} event(s) in ${numSamples} samples ` +
    `(minimum ${minimumSampleDuration} samples, threshold ${dispersionThreshold})`
  );

  return new EventFrame({ name, onsets, offsets });
}
