/**
 * Code Registry REST Routes
 *
 * - GET /api/v1/modules: modules with their items and variables (labels, units)
 *
 * The presentation layer builds its selectors from this response.
 */

import { ListModulesResponseSchema, type ListModulesResponse } from './schemas.js';

import type { CodeRegistry } from '../../core/types.js';
import type { FastifyPluginAsync } from 'fastify';

export interface MakeCodeRegistryRoutesDeps {
  registry: CodeRegistry;
}

export const makeCodeRegistryRoutes = (deps: MakeCodeRegistryRoutesDeps): FastifyPluginAsync => {
  const { registry } = deps;

  // The catalogue never changes at runtime, so the payload is built once
  const payload: ListModulesResponse = {
    ok: true,
    data: {
      modules: registry.listModules().map((module) => ({
        name: module.name,
        label: module.label,
        items: module.items.map((item) => ({ ...item })),
        variables: module.variables.map((variable) => ({ ...variable })),
      })),
    },
  };

  return async (fastify) => {
    fastify.get(
      '/api/v1/modules',
      {
        schema: {
          response: {
            200: ListModulesResponseSchema,
          },
        },
      },
      async (_request, reply) => {
        return reply.status(200).send(payload);
      }
    );
  };
};
