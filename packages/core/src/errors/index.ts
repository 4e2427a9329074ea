export { BatonBaseError } from './BatonBaseError.js';
export { BatonRuntimeError } from './BatonRuntimeError.js';
export { BatonValidationError, zodToIssues } from './BatonValidationError.js';
export { ErrorScope, ErrorType } from './types.js';
export type { Issue, Severity } from './types.js';
