/**
 * Database health checker: `SELECT 1` raced against a timeout.
 */

import { sql } from 'kysely';

import type { HealthChecker } from '../../core/ports.js';
import type { ProjectionsDbClient } from '@/infra/database/client.js';

const DEFAULT_TIMEOUT_MS = 3000;

export interface DbHealthCheckerOptions {
  name?: string;
  timeoutMs?: number;
}

export const makeDbHealthChecker = (
  db: ProjectionsDbClient,
  options: DbHealthCheckerOptions = {}
): HealthChecker => {
  const { name = 'database', timeoutMs = DEFAULT_TIMEOUT_MS } = options;

  return async () => {
    const startTime = Date.now();
    let timer: NodeJS.Timeout | undefined;

    try {
      const timeout = new Promise<never>((_resolve, reject) => {
        timer = setTimeout(() => {
          reject(new Error(`Database health check timed out after ${String(timeoutMs)}ms`));
        }, timeoutMs);
      });
      await Promise.race([sql`SELECT 1`.execute(db), timeout]);

      return { name, status: 'healthy', latencyMs: Date.now() - startTime, critical: true };
    } catch (error) {
      return {
        name,
        status: 'unhealthy',
        message: error instanceof Error ? error.message : 'Unknown database error',
        latencyMs: Date.now() - startTime,
        critical: true,
      };
    } finally {
      clearTimeout(timer);
    }
  };
};
