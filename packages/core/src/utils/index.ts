export * from './error-conversion.js';
export * from './redactor.js';
export * from './safe-stringify.js';
export * from './env.js';
