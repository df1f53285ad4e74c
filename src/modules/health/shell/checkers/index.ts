export { makeDbHealthChecker, type DbHealthCheckerOptions } from './db-checker.js';
export { makeReferenceDataChecker } from './reference-data-checker.js';
