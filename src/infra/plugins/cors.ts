/**
 * CORS plugin for Fastify
 * The API is read-only and consumed by browser dashboards on other origins.
 */

import cors from '@fastify/cors';

import type { AppConfig } from '../config/env.js';
import type { FastifyInstance } from 'fastify';

/**
 * Parses the comma-separated ALLOWED_ORIGINS value
 */
export const parseAllowedOrigins = (raw: string | undefined): Set<string> =>
  new Set(
    (raw ?? '')
      .split(',')
      .map((s) => s.trim())
      .filter((s) => s !== '')
  );

export function isLocalhostOrigin(origin: string): boolean {
  try {
    const url = new URL(origin);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      return false;
    }
    return url.hostname === 'localhost' || url.hostname === '127.0.0.1' || url.hostname === '[::1]';
  } catch {
    return false;
  }
}

/**
 * Whether a request from `origin` may read responses.
 * Requests without an Origin header (server-to-server, curl) are always allowed.
 */
export const isOriginAllowed = (
  origin: string | undefined,
  allowedOrigins: ReadonlySet<string>,
  allowLocalhost: boolean
): boolean => {
  if (origin === undefined || origin === '') return true;
  if (allowedOrigins.has(origin)) return true;
  return allowLocalhost && isLocalhostOrigin(origin);
};

/**
 * Register CORS plugin with Fastify
 */
export async function registerCors(fastify: FastifyInstance, config: AppConfig): Promise<void> {
  const allowedOrigins = parseAllowedOrigins(config.cors.allowedOrigins);

  await fastify.register(cors, {
    origin: (origin, cb) => {
      cb(null, isOriginAllowed(origin, allowedOrigins, config.server.isDevelopment));
    },
    methods: ['GET', 'HEAD', 'OPTIONS'],
    allowedHeaders: ['content-type', 'accept'],
  });
}
