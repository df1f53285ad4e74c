import { describe, it, expect } from 'vitest';

import { getReadiness, overallStatus } from '@/modules/health/index.js';

import { makeFailingHealthChecker, makeHealthChecker } from '../../fixtures/builders.js';

import type { HealthChecker } from '@/modules/health/index.js';

describe('getReadiness', () => {
  const timestamp = '2030-01-01T00:00:00Z';
  const uptime = 42;

  it('returns ok when every check is healthy', async () => {
    const checkers: HealthChecker[] = [
      makeHealthChecker({ name: 'database', critical: true }),
      makeHealthChecker({ name: 'regions', critical: false }),
    ];

    const result = await getReadiness({ checkers }, { uptime, timestamp });

    expect(result.status).toBe('ok');
    expect(result.timestamp).toBe(timestamp);
    expect(result.uptime).toBe(uptime);
    expect(result.checks.map((c) => c.name)).toEqual(['database', 'regions']);
    expect(result.version).toBeUndefined();
  });

  it('includes the version when provided', async () => {
    const result = await getReadiness({ checkers: [], version: '1.2.0' }, { uptime, timestamp });

    expect(result.version).toBe('1.2.0');
  });

  it('is degraded when only the reference data is missing', async () => {
    const checkers: HealthChecker[] = [
      makeHealthChecker({ name: 'database', critical: true }),
      makeHealthChecker({ name: 'regions', status: 'unhealthy', critical: false }),
    ];

    expect((await getReadiness({ checkers }, { uptime, timestamp })).status).toBe('degraded');
  });

  it('is unhealthy when the database check fails', async () => {
    const checkers: HealthChecker[] = [
      makeHealthChecker({ name: 'database', status: 'unhealthy', critical: true }),
      makeHealthChecker({ name: 'regions', status: 'unhealthy', critical: false }),
    ];

    expect((await getReadiness({ checkers }, { uptime, timestamp })).status).toBe('unhealthy');
  });

  it('turns a rejected checker into a critical failure named by position', async () => {
    const checkers: HealthChecker[] = [
      makeHealthChecker({ name: 'database' }),
      makeFailingHealthChecker('socket hang up'),
    ];

    const result = await getReadiness({ checkers }, { uptime, timestamp });

    expect(result.status).toBe('unhealthy');
    expect(result.checks[1]).toEqual({
      name: 'check-2',
      status: 'unhealthy',
      message: 'socket hang up',
      critical: true,
    });
  });

  it('describes a non-Error rejection generically', async () => {
    const checkers: HealthChecker[] = [
      async () => {
        // eslint-disable-next-line @typescript-eslint/only-throw-error -- non-Error rejection
        throw 'boom';
      },
    ];

    const result = await getReadiness({ checkers }, { uptime, timestamp });

    expect(result.checks[0]?.message).toBe('Check failed');
  });
});

describe('overallStatus', () => {
  it('treats a failing check without a critical flag as critical', () => {
    expect(overallStatus([{ name: 'x', status: 'unhealthy' }])).toBe('unhealthy');
  });

  it('is ok with no checks', () => {
    expect(overallStatus([])).toBe('ok');
  });
});
