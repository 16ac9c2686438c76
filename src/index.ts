export * from './errors.js';
export * from './logger.js';
export * from './identity/device.js';
export * from './message/envelope.js';
export * from './message/codec.js';
export { isRecord, payloadFromWire, payloadToWire } from './message/schema.js';
export * from './discovery/peer.js';
export * from './discovery/peer-table.js';
export * from './discovery/announcement.js';
export * from './discovery/channel.js';
export * from './discovery/engine.js';
export * from './trust/trust-store.js';
export * from './transport/types.js';
export * from './transport/tcp.js';
export * from './transport/websocket.js';
export * from './transport/memory.js';
export * from './session/backoff.js';
export * from './session/channel.js';
export * from './session/dispatcher.js';
export * from './session/session-manager.js';
export * from './pairing/pairing-key.js';
export * from './pairing/coordinator.js';
export * from './config.js';
export * from './node.js';
export { AsyncQueue } from './utils/async-queue.js';
