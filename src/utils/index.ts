export * from './config.utils.js';
export * from './export.utils.js';
export * from './listing-parser.utils.js';
export * from './logger.utils.js';
export * from './progress.utils.js';
export * from './table-parser.utils.js';
export * from './template-generator.utils.js';
export * from './text.utils.js';
export * from './version.utils.js';
