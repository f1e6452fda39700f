import crypto from 'node:crypto';
import type { FastifyRequest } from 'fastify';
import type { AppConfig } from './config.js';
import { HttpError } from './errors.js';

function sha256(input: string): Buffer {
  return crypto.createHash('sha256').update(input, 'utf8').digest();
}

function bearerToken(request: FastifyRequest): string {
  const header = request.headers.authorization ?? '';
  const m = header.match(/^Bearer\s+(.+)$/i);
  return m?.[1]?.trim() ?? '';
}

export function isAdmin(config: Pick<AppConfig, 'ADMIN_TOKEN'>, request: FastifyRequest): boolean {
  const expected = config.ADMIN_TOKEN.trim();
  const presented = bearerToken(request);
  if (!expected || !presented) return false;

  // Compare digests so lengths always match.
  return crypto.timingSafeEqual(sha256(presented), sha256(expected));
}

export function requireAdmin(config: Pick<AppConfig, 'ADMIN_TOKEN'>, request: FastifyRequest): void {
  if (!isAdmin(config, request)) throw new HttpError(401, 'UNAUTHORIZED', 'Unauthorized');
}
