import type { HealthChecker } from '../ports.js';
import type { HealthCheckResult, ReadinessResponse, ReadinessStatus } from '../types.js';

export interface GetReadinessDeps {
  checkers: readonly HealthChecker[];
  version?: string | undefined;
}

export interface GetReadinessInput {
  uptime: number;
  timestamp: string;
}

const toCheckResult = (
  result: PromiseSettledResult<HealthCheckResult>,
  position: number
): HealthCheckResult => {
  if (result.status === 'fulfilled') {
    return result.value;
  }
  const reason: unknown = result.reason;
  return {
    name: `check-${String(position + 1)}`,
    status: 'unhealthy',
    message: reason instanceof Error ? reason.message : 'Check failed',
    critical: true,
  };
};

export const overallStatus = (checks: readonly HealthCheckResult[]): ReadinessStatus => {
  const failing = checks.filter((c) => c.status === 'unhealthy');
  if (failing.some((c) => c.critical !== false)) return 'unhealthy';
  if (failing.length > 0) return 'degraded';
  return 'ok';
};

/**
 * Runs every checker in parallel and folds the results into one readiness report.
 */
export async function getReadiness(
  deps: GetReadinessDeps,
  input: GetReadinessInput
): Promise<ReadinessResponse> {
  const settled = await Promise.allSettled(deps.checkers.map((checker) => checker()));
  const checks = settled.map(toCheckResult);

  return {
    status: overallStatus(checks),
    timestamp: input.timestamp,
    uptime: input.uptime,
    checks,
    ...(deps.version !== undefined && { version: deps.version }),
  };
}
