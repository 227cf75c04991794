import { EventRecord } from './types';
import { LengthMismatchError } from './errors';

export interface EventFrameInit {
  name?: string | ReadonlyArray<string>;
  onsets?: ReadonlyArray<number> | Float64Array;
  offsets?: ReadonlyArray<number> | Float64Array;
}

/**
 * Tabular collection of detected events with the columns
 * name, onset, offset and duration (offset - onset).
 */
export default class EventFrame {
  private readonly _names: string[];
  private readonly _onsets: number[];
  private readonly _offsets: number[];

  constructor({ name = 'event', onsets = [], offsets = [] }: EventFrameInit = {}) {
    const onsetValues = Array.from(onsets);
    const offsetValues = Array.from(offsets);

    if (onsetValues.length !== offsetValues.length) {
      throw new LengthMismatchError(
        `onsets and offsets must be of equal length, but are ${onsetValues.length} and ${offsetValues.length}`
      );
    }

    let names: string[];
    if (typeof name === 'string') {
      names = onsetValues.map(() => name);
    } else {
      if (name.length !== onsetValues.length) {
        throw new LengthMismatchError(
          `name must be a string or have one entry per event (${onsetValues.length}), but has ${name.length}`
        );
      }
      names = [...name];
    }

    this._names = names;
    this._onsets = onsetValues;
    this._offsets = offsetValues;
  }

  get length(): number {
    return this._onsets.length;
  }

  get names(): string[] {
    return [...this._names];
  }

  get onsets(): number[] {
    return [...this._onsets];
  }

  get offsets(): number[] {
    return [...this._offsets];
  }

  get durations(): number[] {
    return this._onsets.map((onset, i) => this._offsets[i] - onset);
  }

  rows(): EventRecord[] {
    return this._onsets.map((onset, i) => ({
      name: this._names[i],
      onset,
      offset: this._offsets[i],
      duration: this._offsets[i] - onset,
    }));
  }

  /**
   * New frame holding the rows of this frame followed by those of `other`.
   */
  concat(other: EventFrame): EventFrame {
    return new EventFrame({
      name: [...this._names, ...other._names],
      onsets: [...this._onsets, ...other._onsets],
      offsets: [...this._offsets, ...other._offsets],
    });
  }

  /**
   * New frame with the events whose duration lies in [minimum, maximum].
   */
  filterByDuration(minimum: number, maximum: number = Infinity): EventFrame {
    const keep = this.rows().filter(row => row.duration >= minimum && row.duration <= maximum);
    return new EventFrame({
      name: keep.map(row => row.name),
      onsets: keep.map(row => row.onset),
      offsets: keep.map(row => row.offset),
    });
  }

  toJSON(): EventRecord[] {
    return this.rows();
  }
}
