/**
 * @botkeeper/supervisor -- restart controller for a supervised bot process.
 *
 * Provides the restart ledger, the tiered backoff policy, the shared
 * supervisor state, the child-process launcher and the controller loop.
 */

export * from './strategies.js';
export * from './ledger.js';
export * from './sleep.js';
export * from './state.js';
export * from './supervisor.js';
export * from './process-supervisor.js';
