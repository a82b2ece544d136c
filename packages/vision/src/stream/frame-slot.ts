/**
 * Frame Slot - single-value latest-wins publish/subscribe primitive
 *
 * Holds only the most recent value. Waiters are released together on the
 * next publish; a reader that falls behind skips whatever it missed.
 */

/**
 * Options for waiting on the next value
 */
export interface SlotWaitOptions {
  /** Abort the wait (e.g. client went away) */
  signal?: AbortSignal;
  /** Give up after this many milliseconds; 0 or undefined waits forever */
  timeoutMs?: number;
}

export interface FrameSlotConfig {
  /** Error used when a wait times out */
  onTimeout: (timeoutMs: number) => Error;
}

const DEFAULT_CONFIG: FrameSlotConfig = {
  onTimeout: (timeoutMs) => new Error(`No value published within ${timeoutMs}ms`),
};

interface Waiter<T> {
  resolve: (value: T) => void;
  reject: (error: Error) => void;
}

export class FrameSlot<T> {
  private value: T | undefined = undefined;
  private version = 0;
  private waiters: Set<Waiter<T>> = new Set();
  private closedWith: Error | null = null;
  private config: FrameSlotConfig;

  constructor(config: Partial<FrameSlotConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Replace the slot content and release every waiter with it
   */
  publish(value: T): void {
    if (this.closedWith) return;

    this.value = value;
    this.version++;

    const waiting = Array.from(this.waiters);
    this.waiters.clear();
    for (const waiter of waiting) {
      waiter.resolve(value);
    }
  }

  /**
   * Wait for the next value published after this call
   */
  next(options: SlotWaitOptions = {}): Promise<T> {
    return this.nextAfter(this.version, options);
  }

  /**
   * Resolve with the current value if it is newer than `version`,
   * otherwise wait for the next publish
   */
  nextAfter(version: number, options: SlotWaitOptions = {}): Promise<T> {
    if (this.closedWith) {
      return Promise.reject(this.closedWith);
    }
    if (this.version > version && this.value !== undefined) {
      return Promise.resolve(this.value);
    }

    const { signal, timeoutMs } = options;
    if (signal?.aborted) {
      return Promise.reject(abortReason(signal));
    }

    return new Promise<T>((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;

      const cleanup = () => {
        this.waiters.delete(waiter);
        if (timer) clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
      };

      const waiter: Waiter<T> = {
        resolve: (value) => {
          cleanup();
          resolve(value);
        },
        reject: (error) => {
          cleanup();
          reject(error);
        },
      };

      const onAbort = () => {
        waiter.reject(signal ? abortReason(signal) : new Error('Wait aborted'));
      };

      if (timeoutMs && timeoutMs > 0) {
        timer = setTimeout(() => waiter.reject(this.config.onTimeout(timeoutMs)), timeoutMs);
      }
      signal?.addEventListener('abort', onAbort, { once: true });

      this.waiters.add(waiter);
    });
  }

  /**
   * Reject all current and future waits with `reason`
   */
  close(reason: Error): void {
    if (this.closedWith) return;
    this.closedWith = reason;

    const waiting = Array.from(this.waiters);
    this.waiters.clear();
    for (const waiter of waiting) {
      waiter.reject(reason);
    }
  }

  /**
   * Most recently published value, without waiting
   */
  latest(): T | undefined {
    return this.value;
  }

  /**
   * Number of publishes so far
   */
  getVersion(): number {
    return this.version;
  }

  waiterCount(): number {
    return this.waiters.size;
  }

  isClosed(): boolean {
    return this.closedWith !== null;
  }
}

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new Error('Wait aborted');
}
