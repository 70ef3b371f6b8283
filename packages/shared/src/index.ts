export * from './types.js';
export * from './errors.js';
export * from './env.js';
export * from './db/index.js';
export * from './identity-store.js';
export * from './notifier.js';
export * from './discovery.js';
export * from './backoff.js';
export * from './poll-loop.js';
export * from './crawler.js';
export * from './shutdown.js';
export * from './token.js';
