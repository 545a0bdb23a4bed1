import type { Socket } from 'socket.io';
import type { SignalQualityAggregator } from '../modules/SignalQualityAggregator.js';
import type {
  ClientToServerEvents,
  ServerToClientEvents,
  RssiPayload,
  SnrPayload,
  FecPayload,
} from '../types/protocol.js';
import { getLogger } from '../utils/logger.js';

let logger: ReturnType<typeof getLogger> | null = null;

function log(level: 'debug' | 'info' | 'warn' | 'error', message: string, ...args: unknown[]): void {
  if (!logger) {
    try {
      logger = getLogger().child({ context: 'SocketHandler' });
    } catch {
      return;
    }
  }
  logger[level](message, ...args);
}

export type SampleKind = 'rssi' | 'snr' | 'fec';

export interface IngestStats {
  accepted: Record<SampleKind, number>;
  rejected: Record<SampleKind, number>;
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function isAntennaPayload(payload: unknown): payload is RssiPayload | SnrPayload {
  if (typeof payload !== 'object' || payload === null) {
    return false;
  }
  return 'ant1' in payload && isFiniteNumber(payload.ant1)
    && 'ant2' in payload && isFiniteNumber(payload.ant2);
}

function isFecPayload(payload: unknown): payload is FecPayload {
  if (typeof payload !== 'object' || payload === null) {
    return false;
  }
  return 'all' in payload && isFiniteNumber(payload.all)
    && 'recovered' in payload && isFiniteNumber(payload.recovered)
    && 'lost' in payload && isFiniteNumber(payload.lost);
}

/**
 * Validates producer payloads and forwards them to the aggregator
 */
export class SampleIngestor {
  private aggregator: SignalQualityAggregator;
  private stats: IngestStats = {
    accepted: { rssi: 0, snr: 0, fec: 0 },
    rejected: { rssi: 0, snr: 0, fec: 0 },
  };

  constructor(aggregator: SignalQualityAggregator) {
    this.aggregator = aggregator;
  }

  /**
   * @returns error message, or null when the sample was recorded
   */
  ingest(kind: SampleKind, payload: unknown): string | null {
    switch (kind) {
      case 'rssi':
        if (!isAntennaPayload(payload)) {
          return this.reject(kind, 'ant1 and ant2 must be finite numbers');
        }
        this.aggregator.recordRssi(payload.ant1, payload.ant2);
        break;
      case 'snr':
        if (!isAntennaPayload(payload)) {
          return this.reject(kind, 'ant1 and ant2 must be finite numbers');
        }
        this.aggregator.recordSnr(payload.ant1, payload.ant2);
        break;
      case 'fec':
        if (!isFecPayload(payload)) {
          return this.reject(kind, 'all, recovered and lost must be finite numbers');
        }
        this.aggregator.recordFec(payload.all, payload.recovered, payload.lost);
        break;
    }

    this.stats.accepted[kind]++;
    return null;
  }

  getStats(): IngestStats {
    return {
      accepted: { ...this.stats.accepted },
      rejected: { ...this.stats.rejected },
    };
  }

  private reject(kind: SampleKind, message: string): string {
    this.stats.rejected[kind]++;
    return message;
  }
}

export function setupSocketHandlers(
  socket: Socket<ClientToServerEvents, ServerToClientEvents>,
  ingestor: SampleIngestor
): void {
  log('info', `Producer connected: ${socket.id}`);

  const handle = (kind: SampleKind, event: keyof ClientToServerEvents, payload: unknown): void => {
    const error = ingestor.ingest(kind, payload);
    if (error) {
      log('warn', `Rejected ${event} from ${socket.id}: ${error}`);
      socket.emit('error', { message: error, event });
    }
  };

  socket.on('sample:rssi', (payload) => handle('rssi', 'sample:rssi', payload));
  socket.on('sample:snr', (payload) => handle('snr', 'sample:snr', payload));
  socket.on('sample:fec', (payload) => handle('fec', 'sample:fec', payload));

  // Handle disconnect
  socket.on('disconnect', (reason) => {
    log('info', `Producer disconnected: ${socket.id}, reason: ${reason}`);
  });
}
