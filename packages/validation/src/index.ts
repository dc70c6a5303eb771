export * from './listings.js';
export * from './market-stats.js';
