/**
 * Quality Monitor Module
 * Takes link-quality snapshots at a fixed cadence and raises keyframe requests on session changes
 */
import { EventEmitter } from 'events';
import type { QualitySnapshot, MonitorStatus } from '../types/index.js';
import type { SignalQualityAggregator } from './SignalQualityAggregator.js';
import { getLogger } from '../utils/logger.js';

let logger: ReturnType<typeof getLogger> | null = null;

/**
 * QualityMonitor configuration
 */
export interface QualityMonitorConfig {
  /** Aggregator for the monitored link */
  aggregator: SignalQualityAggregator;
  /** Snapshot interval in milliseconds */
  intervalMs?: number;
}

/**
 * QualityMonitor events
 */
export interface QualityMonitorEvents {
  'snapshot': (snapshot: QualitySnapshot) => void;
  'keyframe:requested': (sessionId: string) => void;
  'started': () => void;
  'stopped': () => void;
}

/**
 * QualityMonitor module
 */
export class QualityMonitor extends EventEmitter {
  private aggregator: SignalQualityAggregator;
  private intervalMs: number;
  private isRunning: boolean = false;
  private timer: NodeJS.Timeout | null = null;
  private snapshotsTaken: number = 0;
  private keyframeRequests: number = 0;
  private lastSnapshot: QualitySnapshot | null = null;

  constructor(config: QualityMonitorConfig) {
    super();
    this.aggregator = config.aggregator;
    this.intervalMs = config.intervalMs ?? 1000;

    // Lazy initialize logger
    if (!logger) {
      try {
        logger = getLogger().child({ context: 'QualityMonitor' });
      } catch {
        logger = null;
      }
    }

    this.log('info', `QualityMonitor initialized with ${this.intervalMs}ms interval`);
  }

  private log(level: 'debug' | 'info' | 'warn' | 'error', message: string, ...args: unknown[]): void {
    if (logger) {
      logger[level](message, ...args);
    }
  }

  /**
   * Start periodic snapshots
   */
  start(): void {
    if (this.isRunning) {
      this.log('warn', 'QualityMonitor already running');
      return;
    }

    this.isRunning = true;
    this.timer = setInterval(() => this.tick(), this.intervalMs);

    this.log('info', 'Quality monitoring started');
    this.emit('started');
  }

  /**
   * Stop periodic snapshots
   */
  stop(): void {
    if (!this.isRunning) {
      return;
    }

    this.isRunning = false;

    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }

    this.log('info', 'Quality monitoring stopped');
    this.emit('stopped');
  }

  /**
   * Take one snapshot and publish it
   */
  tick(): QualitySnapshot {
    const snapshot = this.aggregator.snapshot();
    const previous = this.lastSnapshot;

    this.snapshotsTaken++;
    this.lastSnapshot = snapshot;

    this.log(
      'debug',
      `Link score ${snapshot.linkScore}, rssi ${snapshot.rssi}, snr ${snapshot.snr}, ` +
      `recovered ${snapshot.recoveredLastSecond}, lost ${snapshot.lostLastSecond}`
    );

    this.emit('snapshot', snapshot);

    if (previous && previous.sessionId !== snapshot.sessionId) {
      this.keyframeRequests++;
      this.log('info', `Session changed ${previous.sessionId} -> ${snapshot.sessionId}, requesting keyframe`);
      this.emit('keyframe:requested', snapshot.sessionId);
    }

    return snapshot;
  }

  /**
   * Get monitor status
   */
  getStatus(): MonitorStatus {
    return {
      isRunning: this.isRunning,
      intervalMs: this.intervalMs,
      snapshotsTaken: this.snapshotsTaken,
      keyframeRequests: this.keyframeRequests,
      lastSnapshot: this.lastSnapshot,
    };
  }

  // Typed event emitter methods
  on<K extends keyof QualityMonitorEvents>(
    event: K,
    listener: QualityMonitorEvents[K]
  ): this {
    return super.on(event, listener);
  }

  emit<K extends keyof QualityMonitorEvents>(
    event: K,
    ...args: Parameters<QualityMonitorEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }
}
