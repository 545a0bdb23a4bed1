/**
 * Link Quality Service - Main Entry Point
 * Socket.IO server that ingests radio metrics and publishes keyframe requests
 */
import { createServer } from 'http';
import { Server } from 'socket.io';
import { getConfig, type Config } from './utils/config.js';
import { initLogger, getLogger, createChildLogger } from './utils/logger.js';
import { SignalQualityAggregator } from './modules/SignalQualityAggregator.js';
import { QualityMonitor } from './modules/QualityMonitor.js';
import { SampleIngestor, setupSocketHandlers } from './handlers/socket.handler.js';
import type { ClientToServerEvents, ServerToClientEvents } from './types/protocol.js';

// Load configuration
const config: Config = getConfig();

// Initialize logger
initLogger({
  ...config.logging,
  logsPath: config.storage.logsPath,
});
const logger = getLogger();
const qualityLogger = createChildLogger('LinkQuality');

// One aggregator per monitored link, shared by producers and the monitor
const aggregator = new SignalQualityAggregator({
  windowMs: config.quality.windowMs,
  initialSessionId: config.quality.initialSessionId,
});
const monitor = new QualityMonitor({
  aggregator,
  intervalMs: config.quality.snapshotIntervalMs,
});
const ingestor = new SampleIngestor(aggregator);

const httpServer = createServer();
const io = new Server<ClientToServerEvents, ServerToClientEvents>(httpServer, {
  cors: {
    origin: '*',
    methods: ['GET', 'POST'],
  },
});

io.on('connection', (socket) => {
  setupSocketHandlers(socket, ingestor);
});

monitor.on('snapshot', (snapshot) => {
  qualityLogger.info(
    `score=${snapshot.linkScore} rssi=${snapshot.rssi} snr=${snapshot.snr} ` +
    `recovered=${snapshot.recoveredLastSecond} lost=${snapshot.lostLastSecond} session=${snapshot.sessionId}`
  );
});

monitor.on('keyframe:requested', (sessionId) => {
  io.emit('keyframe:request', {
    sessionId,
    timestamp: new Date().toISOString(),
  });
});

httpServer.on('error', (error: Error) => {
  logger.error('HTTP server error:', error);
  process.exit(1);
});

httpServer.listen(config.server.port, config.server.host, () => {
  logger.info(`Link Quality Service listening on ${config.server.host}:${config.server.port}`);
  logger.info(`Window: ${config.quality.windowMs}ms, snapshot interval: ${config.quality.snapshotIntervalMs}ms`);
  monitor.start();
});

/**
 * Graceful shutdown
 */
function shutdown(signal: string): void {
  logger.info(`${signal} received, shutting down gracefully...`);
  monitor.stop();
  logger.info('Ingest stats:', ingestor.getStats());
  io.close(() => {
    logger.info('Server closed');
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
