import { Type, type Static } from '@sinclair/typebox';

export const HealthCheckResultSchema = Type.Object({
  name: Type.String({ description: 'Component being checked' }),
  status: Type.Union([Type.Literal('healthy'), Type.Literal('unhealthy')]),
  message: Type.Optional(Type.String()),
  latencyMs: Type.Optional(Type.Number()),
  /** A failing critical check makes the service unhealthy; any other failure only degrades it */
  critical: Type.Optional(Type.Boolean()),
});

export type HealthCheckResult = Static<typeof HealthCheckResultSchema>;

export const LivenessResponseSchema = Type.Object({
  status: Type.Literal('ok'),
});

export type LivenessResponse = Static<typeof LivenessResponseSchema>;

export const ReadinessStatusSchema = Type.Union([
  Type.Literal('ok'),
  Type.Literal('degraded'),
  Type.Literal('unhealthy'),
]);

export type ReadinessStatus = Static<typeof ReadinessStatusSchema>;

export const ReadinessResponseSchema = Type.Object({
  status: ReadinessStatusSchema,
  timestamp: Type.String({ format: 'date-time' }),
  version: Type.Optional(Type.String()),
  uptime: Type.Number({ description: 'Seconds since the routes were registered' }),
  checks: Type.Array(HealthCheckResultSchema),
});

export type ReadinessResponse = Static<typeof ReadinessResponseSchema>;
