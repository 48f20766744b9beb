export * from './config.interfaces.js';
export * from './install.interfaces.js';
export * from './logger.interfaces.js';
export * from './package.interfaces.js';
export * from './process.interfaces.js';
