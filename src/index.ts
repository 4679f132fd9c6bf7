export { getConfig, loadConfig, resetConfig } from './config/index.js';
export * from './types/index.js';
export * from './enforcement/index.js';
export * from './sources/index.js';
export * from './publishing/index.js';
