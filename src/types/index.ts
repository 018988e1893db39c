export * from './intent.js';
export * from './policy.js';
export * from './outcome.js';
export * from './audit.js';
export * from './mission.js';
