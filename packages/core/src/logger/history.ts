import { ErrorCode } from "@logfan/shared";
import { ConfigurationError } from "../errors/types.js";

/**
 * Bounded FIFO of formatted lines. Appending past capacity drops the oldest
 * line.
 */
export class HistoryBuffer {
  readonly capacity: number;
  private readonly slots: (string | undefined)[];
  private head = 0;
  private count = 0;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new ConfigurationError(
        `History capacity must be a non-negative integer, got ${capacity}`,
        ErrorCode.INVALID_ARGUMENT,
        { context: { capacity } }
      );
    }
    this.capacity = capacity;
    this.slots = new Array<string | undefined>(capacity);
  }

  get size(): number {
    return this.count;
  }

  append(line: string): void {
    if (this.capacity === 0) {
      return;
    }
    const tail = (this.head + this.count) % this.capacity;
    this.slots[tail] = line;
    if (this.count < this.capacity) {
      this.count++;
    } else {
      this.head = (this.head + 1) % this.capacity;
    }
  }

  clear(): void {
    this.slots.fill(undefined);
    this.head = 0;
    this.count = 0;
  }

  /**
   * Lines oldest first, as they were when called. Iterating twice yields the
   * same lines; later appends are not visible.
   */
  snapshot(): Iterable<string> {
    const lines = this.toArray();
    return {
      *[Symbol.iterator]() {
        yield* lines;
      },
    };
  }

  toArray(): string[] {
    const lines: string[] = [];
    for (let i = 0; i < this.count; i++) {
      const line = this.slots[(this.head + i) % this.capacity];
      if (line !== undefined) {
        lines.push(line);
      }
    }
    return lines;
  }
}
