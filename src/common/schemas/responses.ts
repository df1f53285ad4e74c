/**
 * Response envelope schemas shared by the REST modules.
 */

import { Type, type Static } from '@sinclair/typebox';

/**
 * Error response schema.
 */
export const ErrorResponseSchema = Type.Object({
  ok: Type.Literal(false),
  error: Type.String({ description: 'Error type' }),
  message: Type.Optional(Type.String({ description: 'Human-readable error message' })),
});

export type ErrorResponse = Static<typeof ErrorResponseSchema>;

export const toErrorResponse = (error: { type: string; message: string }): ErrorResponse => ({
  ok: false,
  error: error.type,
  message: error.message,
});
