/**
 * Projections REST Routes
 *
 * - GET /api/v1/projections: filtered facts of one module
 * - GET /api/v1/projections/aggregate: grouped sums (time series or shares)
 * - GET /api/v1/stats/headline: cross-module headline figures
 */

import { ErrorResponseSchema, toErrorResponse } from '@/common/schemas/responses.js';

import {
  AggregateQuerySchema,
  AggregateResponseSchema,
  HeadlineQuerySchema,
  HeadlineResponseSchema,
  ListProjectionsResponseSchema,
  ProjectionQuerySchema,
  type AggregateQuery,
  type HeadlineQuery,
  type ProjectionQuery,
} from './schemas.js';
import { PROJECTION_ERROR_HTTP_STATUS } from '../../core/errors.js';
import { aggregateProjections } from '../../core/usecases/aggregate-projections.js';
import { getHeadlineStats } from '../../core/usecases/get-headline-stats.js';
import { listProjections } from '../../core/usecases/list-projections.js';

import type { FactQueryRepository } from '../../core/ports.js';
import type { ProjectionFilterInput } from '../../core/types.js';
import type { CodeRegistry } from '@/modules/code-registry/index.js';
import type { FastifyPluginAsync } from 'fastify';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface MakeProjectionRoutesDeps {
  registry: CodeRegistry;
  factQueryRepo: FactQueryRepository;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const toFilterInput = (query: ProjectionQuery): ProjectionFilterInput => ({
  module: query.module,
  variable: query.variable,
  item: query.item,
  region: query.region,
  year: query.year,
  yearStart: query.year_start,
  yearEnd: query.year_end,
});

const errorResponses = {
  400: ErrorResponseSchema,
  500: ErrorResponseSchema,
};

// ─────────────────────────────────────────────────────────────────────────────
// Routes Factory
// ─────────────────────────────────────────────────────────────────────────────

export const makeProjectionRoutes = (deps: MakeProjectionRoutesDeps): FastifyPluginAsync => {
  const { registry, factQueryRepo } = deps;

  return async (fastify) => {
    fastify.get<{ Querystring: ProjectionQuery }>(
      '/api/v1/projections',
      {
        schema: {
          querystring: ProjectionQuerySchema,
          response: { 200: ListProjectionsResponseSchema, ...errorResponses },
        },
      },
      async (request, reply) => {
        const result = await listProjections(
          { registry, factQueryRepo },
          toFilterInput(request.query)
        );

        if (result.isErr()) {
          const status = PROJECTION_ERROR_HTTP_STATUS[result.error.type];
          return reply.status(status).send(toErrorResponse(result.error));
        }

        return reply.status(200).send({
          ok: true,
          data: {
            projections: result.value.map((row) => ({ ...row, value: row.value.toFixed() })),
          },
        });
      }
    );

    fastify.get<{ Querystring: AggregateQuery }>(
      '/api/v1/projections/aggregate',
      {
        schema: {
          querystring: AggregateQuerySchema,
          response: { 200: AggregateResponseSchema, ...errorResponses },
        },
      },
      async (request, reply) => {
        const { group_by: groupBy = 'year', ...filter } = request.query;
        const result = await aggregateProjections(
          { registry, factQueryRepo },
          { filter: toFilterInput(filter), groupBy }
        );

        if (result.isErr()) {
          const status = PROJECTION_ERROR_HTTP_STATUS[result.error.type];
          return reply.status(status).send(toErrorResponse(result.error));
        }

        const { unit, groups } = result.value;
        return reply.status(200).send({
          ok: true,
          data: {
            unit,
            groupBy,
            groups: groups.map((group) => ({ key: group.key, value: group.value.toFixed() })),
          },
        });
      }
    );

    fastify.get<{ Querystring: HeadlineQuery }>(
      '/api/v1/stats/headline',
      {
        schema: {
          querystring: HeadlineQuerySchema,
          response: { 200: HeadlineResponseSchema, ...errorResponses },
        },
      },
      async (request, reply) => {
        const { year, item } = request.query;
        const result = await getHeadlineStats({ registry, factQueryRepo }, { year, item });

        if (result.isErr()) {
          const status = PROJECTION_ERROR_HTTP_STATUS[result.error.type];
          return reply.status(status).send(toErrorResponse(result.error));
        }

        return reply.status(200).send({
          ok: true,
          data: {
            stats: result.value.map((stat) => ({ ...stat, value: stat.value.toFixed() })),
          },
        });
      }
    );
  };
};
