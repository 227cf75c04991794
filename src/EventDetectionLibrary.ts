import EventFrame from './EventFrame';
import { IdtOptions, PositionsInput } from './types';
import { ValueError } from './errors';
import { idt } from './idt';

export type EventDetectionMethod<TOptions> = (
  positions: PositionsInput,
  options?: TOptions
) => EventFrame;

/**
 * Name-addressable collection of event detection methods sharing one options type.
 */
export class EventDetectionLibrary<TOptions = Partial<IdtOptions>> {
  private methods = new Map<string, EventDetectionMethod<TOptions>>();

  /**
   * Registers a method under `name`, replacing any method already registered there.
   */
  register(name: string, method: EventDetectionMethod<TOptions>): this {
    this.methods.set(name, method);
    return this;
  }

  has(name: string): boolean {
    return this.methods.has(name);
  }

  get(name: string): EventDetectionMethod<TOptions> {
    const method = this.methods.get(name);
    if (!method) {
      throw new ValueError(
        `Event detection method "${name}" is not registered. Known methods: ${this.names().join(', ') || '(none)'}`
      );
    }
    return method;
  }

  names(): string[] {
    return [...this.methods.keys()];
  }
}

export const defaultEventDetectionLibrary = new EventDetectionLibrary()
  .register('idt', idt);
