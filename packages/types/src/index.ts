export * from './listings.js';
export * from './market.js';
export * from './risk.js';
