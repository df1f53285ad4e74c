import type { HealthCheckResult } from './types.js';

/** Resolves with a result; a rejection counts as a critical failure */
export type HealthChecker = () => Promise<HealthCheckResult>;
