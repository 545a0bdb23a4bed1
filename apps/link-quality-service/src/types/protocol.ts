/**
 * Socket.IO protocol type definitions
 * Producers push radio metrics, the service answers with keyframe requests
 */

/**
 * RSSI payload (one per received packet)
 */
export interface RssiPayload {
  ant1: number;
  ant2: number;
}

/**
 * SNR payload (one per received packet)
 */
export interface SnrPayload {
  ant1: number;
  ant2: number;
}

/**
 * FEC payload (one per decoded block group)
 */
export interface FecPayload {
  all: number;
  recovered: number;
  lost: number;
}

/**
 * Keyframe request broadcast to producers
 */
export interface KeyframeRequestEvent {
  sessionId: string;
  timestamp: string;
}

/**
 * Error event sent back to a producer
 */
export interface IngestErrorEvent {
  message: string;
  event: string;
}

/**
 * Events sent by producers
 */
export interface ClientToServerEvents {
  'sample:rssi': (payload: unknown) => void;
  'sample:snr': (payload: unknown) => void;
  'sample:fec': (payload: unknown) => void;
}

/**
 * Events sent by the service
 */
export interface ServerToClientEvents {
  'keyframe:request': (event: KeyframeRequestEvent) => void;
  'error': (event: IngestErrorEvent) => void;
}
