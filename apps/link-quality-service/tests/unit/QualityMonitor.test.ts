/**
 * Unit tests for QualityMonitor
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { QualityMonitor } from '../../src/modules/QualityMonitor.js';
import { SignalQualityAggregator } from '../../src/modules/SignalQualityAggregator.js';
import { SequenceSessionIdGenerator } from '../../src/services/session-id.service.js';
import { initLogger } from '../../src/utils/logger.js';

// Initialize logger for tests
initLogger({
  level: 'error',
  format: 'simple',
  toFile: false,
  toConsole: false,
  logsPath: './test-logs',
});

describe('QualityMonitor', () => {
  let now: number;
  let aggregator: SignalQualityAggregator;
  let monitor: QualityMonitor;

  beforeEach(() => {
    vi.useFakeTimers();
    now = 0;
    aggregator = new SignalQualityAggregator({
      clock: () => now,
      sessionIdGenerator: new SequenceSessionIdGenerator(['bcde', 'fghi']),
    });
    monitor = new QualityMonitor({ aggregator, intervalMs: 1000 });
  });

  afterEach(() => {
    monitor.stop();
    vi.useRealTimers();
  });

  describe('initialization', () => {
    it('should start idle', () => {
      expect(monitor.getStatus()).toEqual({
        isRunning: false,
        intervalMs: 1000,
        snapshotsTaken: 0,
        keyframeRequests: 0,
        lastSnapshot: null,
      });
    });

    it('should default to a one second interval', () => {
      const defaults = new QualityMonitor({ aggregator });
      expect(defaults.getStatus().intervalMs).toBe(1000);
    });
  });

  describe('start and stop', () => {
    it('should emit started and stopped events', () => {
      const startedSpy = vi.fn();
      const stoppedSpy = vi.fn();
      monitor.on('started', startedSpy);
      monitor.on('stopped', stoppedSpy);

      monitor.start();
      expect(monitor.getStatus().isRunning).toBe(true);
      expect(startedSpy).toHaveBeenCalledTimes(1);

      monitor.stop();
      expect(monitor.getStatus().isRunning).toBe(false);
      expect(stoppedSpy).toHaveBeenCalledTimes(1);
    });

    it('should not start twice', () => {
      const startedSpy = vi.fn();
      monitor.on('started', startedSpy);

      monitor.start();
      monitor.start();

      expect(startedSpy).toHaveBeenCalledTimes(1);
      vi.advanceTimersByTime(1000);
      expect(monitor.getStatus().snapshotsTaken).toBe(1);
    });

    it('should ignore stop when not running', () => {
      const stoppedSpy = vi.fn();
      monitor.on('stopped', stoppedSpy);

      monitor.stop();
      expect(stoppedSpy).not.toHaveBeenCalled();
    });

    it('should take one snapshot per interval', () => {
      const snapshotSpy = vi.fn();
      monitor.on('snapshot', snapshotSpy);

      monitor.start();
      vi.advanceTimersByTime(3500);

      expect(snapshotSpy).toHaveBeenCalledTimes(3);
      expect(monitor.getStatus().snapshotsTaken).toBe(3);
    });

    it('should stop taking snapshots after stop', () => {
      monitor.start();
      vi.advanceTimersByTime(2000);
      monitor.stop();
      vi.advanceTimersByTime(5000);

      expect(monitor.getStatus().snapshotsTaken).toBe(2);
    });
  });

  describe('tick', () => {
    it('should publish the aggregator snapshot', () => {
      aggregator.recordRssi(63, 0);
      aggregator.recordSnr(30, 0);

      const snapshotSpy = vi.fn();
      monitor.on('snapshot', snapshotSpy);

      const snapshot = monitor.tick();

      expect(snapshot).toEqual({
        lostLastSecond: 300,
        recoveredLastSecond: 300,
        rssi: 63,
        snr: 30,
        linkScore: 50,
        sessionId: 'aaaa',
      });
      expect(snapshotSpy).toHaveBeenCalledWith(snapshot);
      expect(monitor.getStatus().lastSnapshot).toEqual(snapshot);
    });

    it('should hand typed snapshots and session ids to listeners', () => {
      const scores: number[] = [];
      const sessions: string[] = [];
      monitor.on('snapshot', (snapshot) => scores.push(snapshot.linkScore));
      monitor.on('keyframe:requested', (sessionId) => sessions.push(sessionId.toUpperCase()));

      monitor.tick();
      aggregator.recordRssi(126, 126);
      aggregator.recordSnr(60, 60);
      aggregator.recordFec(4, 0, 1);
      monitor.tick();

      expect(scores).toEqual([0, 100]);
      expect(sessions).toEqual(['BCDE']);
    });

    it('should not request a keyframe on the first snapshot', () => {
      const keyframeSpy = vi.fn();
      monitor.on('keyframe:requested', keyframeSpy);

      aggregator.recordFec(10, 0, 2);
      monitor.tick();

      expect(keyframeSpy).not.toHaveBeenCalled();
    });

    it('should request a keyframe when the session changes', () => {
      const keyframeSpy = vi.fn();
      monitor.on('keyframe:requested', keyframeSpy);

      monitor.tick();
      aggregator.recordFec(10, 0, 2);
      monitor.tick();

      expect(keyframeSpy).toHaveBeenCalledTimes(1);
      expect(keyframeSpy).toHaveBeenCalledWith('bcde');
      expect(monitor.getStatus().keyframeRequests).toBe(1);
    });

    it('should request once per observed change', () => {
      const keyframeSpy = vi.fn();
      monitor.on('keyframe:requested', keyframeSpy);

      monitor.tick();
      // Two rotations between snapshots are observed as one change
      aggregator.recordFec(10, 0, 1);
      aggregator.recordFec(10, 0, 1);
      monitor.tick();
      monitor.tick();

      expect(keyframeSpy).toHaveBeenCalledTimes(1);
      expect(keyframeSpy).toHaveBeenCalledWith('fghi');
    });

    it('should not request a keyframe for a loss-free link', () => {
      const keyframeSpy = vi.fn();
      monitor.on('keyframe:requested', keyframeSpy);

      monitor.tick();
      aggregator.recordFec(10, 4, 0);
      monitor.tick();

      expect(keyframeSpy).not.toHaveBeenCalled();
    });
  });
});
