/**
 * Main type exports for inference-router-sim
 */

export * from './tiers.js';
export * from './traffic.js';
export * from './reward.js';
export * from './environment.js';
