import { Clock } from '../../utils/clock.js';

interface Timer {
  at: number;
  seq: number;
  fire: () => void;
}

/**
 * Clock whose time only moves when every pending promise is waiting on a
 * sleep: the earliest timer then fires and time jumps to it. A stage that
 * never settles therefore times out without any real delay.
 */
export class VirtualClock implements Clock {
  private current: number;
  private timers: Timer[] = [];
  private seq = 0;
  private pumping = false;

  constructor(start: Date = new Date('2024-01-01T00:00:00.000Z')) {
    this.current = start.getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise(resolve => {
      if (signal?.aborted) {
        resolve();
        return;
      }
      const timer: Timer = {
        at: this.current + Math.max(0, ms),
        seq: this.seq++,
        fire: () => {
          signal?.removeEventListener('abort', onAbort);
          resolve();
        }
      };
      const onAbort = () => {
        this.timers = this.timers.filter(pending => pending !== timer);
        resolve();
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.timers.push(timer);
      this.schedule();
    });
  }

  private schedule(): void {
    if (this.pumping) return;
    this.pumping = true;
    setImmediate(() => this.fireNext());
  }

  private fireNext(): void {
    this.pumping = false;
    if (this.timers.length === 0) return;

    let next = this.timers[0];
    for (const timer of this.timers) {
      if (timer.at < next.at || (timer.at === next.at && timer.seq < next.seq)) {
        next = timer;
      }
    }
    this.timers = this.timers.filter(timer => timer !== next);
    this.current = Math.max(this.current, next.at);
    next.fire();

    if (this.timers.length > 0) {
      this.schedule();
    }
  }
}
