/**
 * Projections REST API - TypeBox Schemas
 *
 * Query parameters use snake_case; response bodies use camelCase.
 * Decimal values leave the API as exact decimal strings, never in exponent notation.
 */

import { Type, type Static } from '@sinclair/typebox';

// ─────────────────────────────────────────────────────────────────────────────
// Querystrings
// ─────────────────────────────────────────────────────────────────────────────

const filterProperties = {
  module: Type.String({ minLength: 1, description: 'crop, animal, bioenergy or landcover' }),
  variable: Type.String({ minLength: 1, description: 'Variable code, e.g. area or prod' }),
  item: Type.Optional(Type.String({ description: "Item code or 'all'" })),
  region: Type.Optional(Type.String({ description: "Region code or 'all'" })),
  year: Type.Optional(Type.Integer()),
  year_start: Type.Optional(Type.Integer()),
  year_end: Type.Optional(Type.Integer()),
};

export const ProjectionQuerySchema = Type.Object(filterProperties, { additionalProperties: false });

export type ProjectionQuery = Static<typeof ProjectionQuerySchema>;

export const GroupBySchema = Type.Union([
  Type.Literal('year'),
  Type.Literal('item'),
  Type.Literal('region'),
]);

export const AggregateQuerySchema = Type.Object(
  {
    ...filterProperties,
    group_by: Type.Optional(GroupBySchema),
  },
  { additionalProperties: false }
);

export type AggregateQuery = Static<typeof AggregateQuerySchema>;

export const HeadlineQuerySchema = Type.Object(
  {
    year: Type.Optional(Type.Integer()),
    item: Type.Optional(Type.String({ description: "Item code or 'all'" })),
  },
  { additionalProperties: false }
);

export type HeadlineQuery = Static<typeof HeadlineQuerySchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Responses
// ─────────────────────────────────────────────────────────────────────────────

export const ProjectionRowSchema = Type.Object({
  externalId: Type.String(),
  region: Type.String(),
  regionName: Type.String(),
  year: Type.Integer(),
  item: Type.String(),
  itemLabel: Type.String(),
  variable: Type.String(),
  variableLabel: Type.String(),
  value: Type.String(),
  unit: Type.String(),
});

export const ListProjectionsResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    projections: Type.Array(ProjectionRowSchema),
  }),
});

export const AggregateResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    unit: Type.String(),
    groupBy: GroupBySchema,
    groups: Type.Array(
      Type.Object({
        key: Type.Union([Type.Integer(), Type.String()]),
        value: Type.String(),
      })
    ),
  }),
});

export const HeadlineResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    stats: Type.Array(
      Type.Object({
        variable: Type.String(),
        label: Type.String(),
        value: Type.String(),
        unit: Type.String(),
      })
    ),
  }),
});

export type ListProjectionsResponse = Static<typeof ListProjectionsResponseSchema>;
export type AggregateResponse = Static<typeof AggregateResponseSchema>;
export type HeadlineResponse = Static<typeof HeadlineResponseSchema>;
