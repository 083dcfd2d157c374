export * from './state-log.js';
