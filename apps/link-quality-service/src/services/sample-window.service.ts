/**
 * Time-bounded sample window
 * Keeps samples in arrival order and drops those older than the window duration
 */
import type { TimestampedSample } from '../types/index.js';

/**
 * Sample window service
 */
export class SampleWindow<T extends TimestampedSample> {
  private readonly windowMs: number;
  private samples: T[];

  constructor(windowMs: number = 1000) {
    this.windowMs = windowMs;
    this.samples = [];
  }

  /**
   * Append a sample. Timestamps are expected to be non-decreasing.
   */
  push(sample: T): void {
    this.samples.push(sample);
  }

  /**
   * Remove samples whose timestamp is before (now - windowMs)
   * @returns number of samples removed
   */
  prune(now: number): number {
    const cutoff = now - this.windowMs;

    let firstFresh = 0;
    while (firstFresh < this.samples.length && this.samples[firstFresh].timestamp < cutoff) {
      firstFresh++;
    }

    if (firstFresh > 0) {
      this.samples.splice(0, firstFresh);
    }

    return firstFresh;
  }

  /**
   * Retained samples, oldest first
   */
  entries(): ReadonlyArray<T> {
    return this.samples;
  }

  /**
   * Number of retained samples
   */
  size(): number {
    return this.samples.length;
  }

  /**
   * Check if window is empty
   */
  isEmpty(): boolean {
    return this.samples.length === 0;
  }

  /**
   * Window duration in milliseconds
   */
  getWindowMs(): number {
    return this.windowMs;
  }
}
