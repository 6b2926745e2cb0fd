export * from './types.js';
export * from './page-owner-parser.js';
export * from './aggregator.js';
export * from './reporter.js';
export * from './page-owner-analyzer.js';
export * from './report-set.js';
export * from './render-options.js';
