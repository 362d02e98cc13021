export * from './spectrum.js';
export * from './bands.js';
export * from './charts.js';
export * from './scan.js';
