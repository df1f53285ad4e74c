/**
 * Code Registry REST API - TypeBox Schemas
 */

import { Type, type Static } from '@sinclair/typebox';

import { UnitCodeSchema } from '../../core/types.js';

const LabelledCodeSchema = Type.Object({
  code: Type.String(),
  label: Type.String(),
});

export const ModuleResponseItemSchema = Type.Object({
  name: Type.String(),
  label: Type.String(),
  items: Type.Array(
    Type.Composite([LabelledCodeSchema, Type.Object({ category: Type.String() })])
  ),
  variables: Type.Array(Type.Composite([LabelledCodeSchema, Type.Object({ unit: UnitCodeSchema })])),
});

export const ListModulesResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    modules: Type.Array(ModuleResponseItemSchema),
  }),
});

export type ListModulesResponse = Static<typeof ListModulesResponseSchema>;
