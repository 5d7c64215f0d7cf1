/**
 * meshgate
 *
 * Epoch-based membership controller: rotates a shared secret on a fixed
 * interval, re-evaluates benchmark scores every epoch and derives per-node
 * pre-shared keys for the nodes that pass.
 */

// Data model
export * from './membership/types.js';

// Core
export * from './membership/scoreStore.js';
export * from './membership/engine.js';
export * from './crypto/psk.js';
export * from './epoch/manager.js';
export * from './epoch/scheduler.js';

// Collaborators
export * from './publish/snapshotPublisher.js';
export * from './api/router.js';
export * from './api/httpServer.js';

// Ambient
export * from './config.js';
export * from './errors.js';
export * from './logger.js';
