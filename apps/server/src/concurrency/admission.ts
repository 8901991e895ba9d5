import { Logger } from "../utils/logger.js";

/**
 * One unit of admission capacity. `release()` may be called from every exit
 * path of the owning scope; only the first call returns the unit.
 */
export interface AdmissionSlot {
  release(): void;
  readonly released: boolean;
}

/**
 * Bounded admission gate for animated streams.
 * Holds at most `maxStreams` slots at once; further requests are rejected
 * rather than queued.
 */
export class StreamAdmission {
  private active = 0;
  private readonly maxStreams: number;
  private logger: Logger;

  constructor(maxStreams: number, logger?: Logger) {
    if (!Number.isInteger(maxStreams) || maxStreams < 0) {
      throw new RangeError(`maxStreams must be a non-negative integer, got ${maxStreams}`);
    }
    this.maxStreams = maxStreams;
    this.logger = logger || new Logger("StreamAdmission");
  }

  /**
   * Attempt to take a slot.
   * @returns true if acquired, false if at capacity
   */
  tryAcquire(): boolean {
    // Check and increment run in one synchronous step, so no other task can interleave.
    if (this.active >= this.maxStreams) {
      return false;
    }
    this.active += 1;
    return true;
  }

  /**
   * Return a slot. Must be paired with exactly one successful tryAcquire().
   */
  release(): void {
    if (this.active === 0) {
      this.logger.warn("release() called with no active streams");
      return;
    }
    this.active -= 1;
  }

  /**
   * Take a slot wrapped in a handle whose release is idempotent.
   * @returns the slot, or null if at capacity
   */
  acquireSlot(): AdmissionSlot | null {
    if (!this.tryAcquire()) {
      return null;
    }

    let released = false;
    return {
      release: () => {
        if (released) {
          return;
        }
        released = true;
        this.release();
      },
      get released() {
        return released;
      },
    };
  }

  /**
   * Snapshot of the number of held slots, for observability only.
   */
  activeCount(): number {
    return this.active;
  }

  capacity(): number {
    return this.maxStreams;
  }

  isFull(): boolean {
    return this.active >= this.maxStreams;
  }
}
