export * from './types/forge-actions.js';
export * from './types/bridge.js';
export * from './types/job.js';
export * from './types/transport.js';
