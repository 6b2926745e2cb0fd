export * from './errors.js';
export * from './input.js';
export * from './config.js';
export * from './report-tool.js';
export * from './analyze-tool.js';
