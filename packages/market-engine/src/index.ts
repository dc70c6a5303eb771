export * from './services/anomaly-scorer.js';
export * from './services/category-classifier.js';
export * from './services/condition-resolver.js';
export * from './services/constraint-corrector.js';
export * from './services/engine-config.js';
export * from './services/listing-analyzer.js';
export * from './services/market-segmenter.js';
export * from './services/pattern-matcher.js';
export * from './services/pattern-tables.js';
export * from './services/price-normalizer.js';
export * from './services/seller-reputation.js';
export * from './services/spec-extractor.js';
export * from './services/stats-aggregator.js';
export * from './services/text-sanitizer.js';
export * from './repositories/market-stats-file.js';
