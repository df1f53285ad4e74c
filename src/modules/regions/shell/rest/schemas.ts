/**
 * Regions REST API - TypeBox Schemas
 */

import { Type, type Static } from '@sinclair/typebox';

export const RegionSchema = Type.Object({
  code: Type.String(),
  name: Type.String(),
  description: Type.String(),
});

export const ListRegionsResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    regions: Type.Array(RegionSchema),
  }),
});

export type ListRegionsResponse = Static<typeof ListRegionsResponseSchema>;
