/**
 * Clock interface
 * Abstracts time so retry backoff and stage timings are deterministic in tests
 */

export interface Clock {
  /**
   * Get the current time as a Date object
   */
  now(): Date;

  /**
   * Get the current time as a Unix timestamp (milliseconds)
   */
  timestamp(): number;

  /**
   * Get the current time as an ISO 8601 string
   */
  iso(): string;

  /**
   * Wait for a specified duration
   * @param ms - Duration to wait in milliseconds
   */
  delay(ms: number): Promise<void>;

  /**
   * Measure the duration of an async operation
   */
  measure<T>(fn: () => Promise<T>): Promise<{ result: T; durationMs: number }>;
}

/**
 * Real implementation of Clock using system time
 */
export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }

  timestamp(): number {
    return Date.now();
  }

  iso(): string {
    return new Date().toISOString();
  }

  async delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  async measure<T>(fn: () => Promise<T>): Promise<{ result: T; durationMs: number }> {
    const start = Date.now();
    const result = await fn();
    return { result, durationMs: Date.now() - start };
  }
}

/**
 * Clock for tests: delays resolve immediately but advance the virtual time,
 * and every requested delay is recorded in order.
 */
export class ImmediateClock implements Clock {
  private currentTime: number;
  readonly delays: number[] = [];

  constructor(initialTime: Date = new Date('2025-01-01T00:00:00.000Z')) {
    this.currentTime = initialTime.getTime();
  }

  now(): Date {
    return new Date(this.currentTime);
  }

  timestamp(): number {
    return this.currentTime;
  }

  iso(): string {
    return new Date(this.currentTime).toISOString();
  }

  async delay(ms: number): Promise<void> {
    this.delays.push(ms);
    this.currentTime += ms;
  }

  async measure<T>(fn: () => Promise<T>): Promise<{ result: T; durationMs: number }> {
    const start = this.currentTime;
    const result = await fn();
    return { result, durationMs: this.currentTime - start };
  }

  /**
   * Move virtual time forward without recording a delay
   */
  advance(ms: number): void {
    this.currentTime += ms;
  }
}

const defaultClock: Clock = new SystemClock();

export function getDefaultClock(): Clock {
  return defaultClock;
}
