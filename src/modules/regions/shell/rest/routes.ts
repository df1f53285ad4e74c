/**
 * Regions REST Routes
 *
 * - GET /api/v1/regions: all regions ordered by code
 */

import { ErrorResponseSchema, toErrorResponse } from '@/common/schemas/responses.js';

import { ListRegionsResponseSchema } from './schemas.js';
import { REGION_ERROR_HTTP_STATUS } from '../../core/errors.js';
import { listRegions } from '../../core/usecases/list-regions.js';

import type { RegionRepository } from '../../core/ports.js';
import type { FastifyPluginAsync } from 'fastify';

export interface MakeRegionRoutesDeps {
  regionRepo: RegionRepository;
}

export const makeRegionRoutes = (deps: MakeRegionRoutesDeps): FastifyPluginAsync => {
  const { regionRepo } = deps;

  return async (fastify) => {
    fastify.get(
      '/api/v1/regions',
      {
        schema: {
          response: {
            200: ListRegionsResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (_request, reply) => {
        const result = await listRegions({ regionRepo });

        if (result.isErr()) {
          const status = REGION_ERROR_HTTP_STATUS[result.error.type];
          return reply.status(status).send(toErrorResponse(result.error));
        }

        return reply.status(200).send({
          ok: true,
          data: {
            regions: result.value.map((r) => ({
              code: r.code,
              name: r.name,
              description: r.description,
            })),
          },
        });
      }
    );
  };
};
