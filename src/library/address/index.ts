export * from './public-address-detector.js';
