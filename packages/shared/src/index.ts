export * from './bluetooth.js';
