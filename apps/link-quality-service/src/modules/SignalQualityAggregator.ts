/**
 * Signal Quality Aggregator Module
 * Keeps a rolling window of RSSI, SNR and FEC samples and blends them into a link-quality snapshot
 */
import type {
  Clock,
  RssiSample,
  SnrSample,
  FecSample,
  QualitySnapshot,
  SessionIdGenerator,
  AggregatorStatus,
} from '../types/index.js';
import { SampleWindow } from '../services/sample-window.service.js';
import { RandomSessionIdGenerator } from '../services/session-id.service.js';
import { mapRange, antennaMeans } from '../utils/signal-math.js';
import { getLogger } from '../utils/logger.js';

let logger: ReturnType<typeof getLogger> | null = null;

export const RSSI_MAX = 126;
export const SNR_MAX = 60;
export const RSSI_WEIGHT = 0.5;
export const SNR_WEIGHT = 0.5;

/** Reported for both FEC counters while no FEC data is in the window */
export const NO_FEC_DATA = 300;

/** Redraws allowed when the generator repeats the current id */
const MAX_SESSION_ID_DRAWS = 8;

/**
 * Truncate toward zero; -0 becomes 0
 */
function toInteger(value: number): number {
  return Math.trunc(value) + 0;
}

/**
 * SignalQualityAggregator configuration
 */
export interface SignalQualityAggregatorConfig {
  /** Lookback window in milliseconds */
  windowMs?: number;
  /** Monotonic clock, defaults to performance.now() */
  clock?: Clock;
  /** Session identifier source */
  sessionIdGenerator?: SessionIdGenerator;
  /** Session identifier before the first loss */
  initialSessionId?: string;
}

/**
 * SignalQualityAggregator module
 *
 * All public operations are synchronous, so on the event loop each one runs
 * to completion before any other producer or consumer callback. Every public
 * operation prunes expired samples first; private helpers only read state.
 */
export class SignalQualityAggregator {
  private readonly windowMs: number;
  private readonly clock: Clock;
  private readonly sessionIdGenerator: SessionIdGenerator;
  private readonly rssiWindow: SampleWindow<RssiSample>;
  private readonly snrWindow: SampleWindow<SnrSample>;
  private readonly fecWindow: SampleWindow<FecSample>;
  private sessionId: string;

  constructor(config: SignalQualityAggregatorConfig = {}) {
    this.windowMs = config.windowMs ?? 1000;
    this.clock = config.clock ?? (() => performance.now());
    this.sessionIdGenerator = config.sessionIdGenerator ?? new RandomSessionIdGenerator();
    this.sessionId = config.initialSessionId ?? 'aaaa';
    this.rssiWindow = new SampleWindow<RssiSample>(this.windowMs);
    this.snrWindow = new SampleWindow<SnrSample>(this.windowMs);
    this.fecWindow = new SampleWindow<FecSample>(this.windowMs);

    // Lazy initialize logger
    if (!logger) {
      try {
        logger = getLogger().child({ context: 'SignalQualityAggregator' });
      } catch {
        // Logger not initialized yet
        logger = null;
      }
    }

    this.log('info', `SignalQualityAggregator initialized with ${this.windowMs}ms window`);
  }

  private log(level: 'debug' | 'info' | 'warn' | 'error', message: string, ...args: unknown[]): void {
    if (logger) {
      logger[level](message, ...args);
    }
  }

  /**
   * Record per-antenna RSSI for one packet
   */
  recordRssi(ant1: number, ant2: number): void {
    const now = this.clock();
    this.pruneExpired(now);
    this.rssiWindow.push({ timestamp: now, ant1, ant2 });
  }

  /**
   * Record per-antenna SNR for one packet
   */
  recordSnr(ant1: number, ant2: number): void {
    const now = this.clock();
    this.pruneExpired(now);
    this.snrWindow.push({ timestamp: now, ant1, ant2 });
  }

  /**
   * Record FEC counters for one block group.
   * Any loss rotates the session identifier.
   */
  recordFec(all: number, recovered: number, lost: number): void {
    const now = this.clock();
    this.pruneExpired(now);

    if (lost > 0) {
      this.rotateSessionId();
    }

    this.fecWindow.push({ timestamp: now, all, recovered, lost });
  }

  /**
   * Compute the link-quality snapshot over the current window
   */
  snapshot(): QualitySnapshot {
    this.pruneExpired(this.clock());

    const [rssiAnt1, rssiAnt2] = antennaMeans(this.rssiWindow.entries());
    const [snrAnt1, snrAnt2] = antennaMeans(this.snrWindow.entries());

    const score1 = this.blendScore(rssiAnt1, snrAnt1);
    const score2 = this.blendScore(rssiAnt2, snrAnt2);

    const { recovered, lost } = this.accumulateFec();

    return {
      lostLastSecond: lost,
      recoveredLastSecond: recovered,
      // Raw (unmapped) means for display; the score uses the mapped ones
      rssi: toInteger(Math.max(rssiAnt1, rssiAnt2)),
      snr: toInteger(Math.max(snrAnt1, snrAnt2)),
      linkScore: toInteger(Math.max(score1, score2)),
      sessionId: this.sessionId,
    };
  }

  /**
   * Get current aggregator status (does not prune)
   */
  getStatus(): AggregatorStatus {
    return {
      windowMs: this.rssiWindow.getWindowMs(),
      rssiSamples: this.rssiWindow.size(),
      snrSamples: this.snrWindow.size(),
      fecSamples: this.fecWindow.size(),
      sessionId: this.sessionId,
    };
  }

  private pruneExpired(now: number): void {
    this.rssiWindow.prune(now);
    this.snrWindow.prune(now);
    this.fecWindow.prune(now);
  }

  private blendScore(rssiMean: number, snrMean: number): number {
    const rssiNormalized = mapRange(rssiMean, 0, RSSI_MAX, 0, 100);
    const snrNormalized = mapRange(snrMean, 0, SNR_MAX, 0, 100);
    return RSSI_WEIGHT * rssiNormalized + SNR_WEIGHT * snrNormalized;
  }

  private accumulateFec(): { recovered: number; lost: number } {
    if (this.fecWindow.isEmpty()) {
      return { recovered: NO_FEC_DATA, lost: NO_FEC_DATA };
    }

    let recovered = 0;
    let lost = 0;
    for (const sample of this.fecWindow.entries()) {
      recovered += sample.recovered;
      lost += sample.lost;
    }
    return { recovered, lost };
  }

  private rotateSessionId(): void {
    const previous = this.sessionId;
    let next = this.sessionIdGenerator.next();
    for (let draw = 1; next === previous && draw < MAX_SESSION_ID_DRAWS; draw++) {
      next = this.sessionIdGenerator.next();
    }

    if (next === previous) {
      this.log('warn', `Session id generator repeated ${previous} for ${MAX_SESSION_ID_DRAWS} draws, id unchanged`);
      return;
    }

    this.sessionId = next;
    this.log('debug', `Session id rotated: ${previous} -> ${next}`);
  }
}
