export * from './@log/index.js';
export * from './address/index.js';
export * from './config.js';
export * from './credential.js';
export * from './errors.js';
export * from './providers/index.js';
export * from './setup.js';
export * from './state/index.js';
export * from './updater.js';
export * from './x.js';
