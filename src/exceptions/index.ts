export * from './CommandError.js';
export * from './CriticalBatchError.js';
export * from './InstallFailure.js';
export * from './ParseError.js';
export * from './RowParseError.js';
