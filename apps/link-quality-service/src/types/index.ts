/**
 * Core type definitions for Link Quality Service
 */

/**
 * Monotonic time source in milliseconds
 */
export type Clock = () => number;

/**
 * Any sample retained in a window carries its arrival time
 */
export interface TimestampedSample {
  /** Monotonic arrival time in milliseconds */
  timestamp: number;
}

/**
 * Per-antenna RSSI reading (nominal range 0..126)
 */
export interface RssiSample extends TimestampedSample {
  ant1: number;
  ant2: number;
}

/**
 * Per-antenna SNR reading (nominal range 0..60, negatives allowed)
 */
export interface SnrSample extends TimestampedSample {
  ant1: number;
  ant2: number;
}

/**
 * FEC block counters for one decoded block group
 */
export interface FecSample extends TimestampedSample {
  /** Blocks transmitted */
  all: number;
  /** Blocks reconstructed by FEC */
  recovered: number;
  /** Blocks that could not be reconstructed */
  lost: number;
}

/**
 * Result of one aggregation pass. Owned by the caller.
 */
export interface QualitySnapshot {
  /** Lost blocks within the window (300 when no FEC data) */
  readonly lostLastSecond: number;
  /** Recovered blocks within the window (300 when no FEC data) */
  readonly recoveredLastSecond: number;
  /** Best antenna's mean raw RSSI */
  readonly rssi: number;
  /** Best antenna's mean raw SNR */
  readonly snr: number;
  /** Blended score in [0, 100] */
  readonly linkScore: number;
  /** Current link epoch marker */
  readonly sessionId: string;
}

/**
 * Produces a fresh session identifier on every call
 */
export interface SessionIdGenerator {
  next(): string;
}

/**
 * Aggregator status for diagnostics
 */
export interface AggregatorStatus {
  windowMs: number;
  rssiSamples: number;
  snrSamples: number;
  fecSamples: number;
  sessionId: string;
}

/**
 * Quality monitor status
 */
export interface MonitorStatus {
  /** Is the snapshot timer running */
  isRunning: boolean;
  /** Snapshot cadence in milliseconds */
  intervalMs: number;
  /** Snapshots taken since construction */
  snapshotsTaken: number;
  /** Keyframe requests raised since construction */
  keyframeRequests: number;
  /** Most recent snapshot, if any */
  lastSnapshot: QualitySnapshot | null;
}
