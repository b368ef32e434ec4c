/**
 * Admin authentication for configuration endpoints
 */

import { timingSafeEqual } from 'node:crypto';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { AuthenticationError } from '@lazarus/core';

export type AuthHook = (request: FastifyRequest, reply: FastifyReply) => Promise<void>;

/**
 * Extract the bearer credential from an Authorization header
 * @throws {AuthenticationError} When the header is missing or malformed
 */
export function extractBearerToken(authorization?: string): string {
  if (!authorization) {
    throw new AuthenticationError('Missing Authorization header');
  }

  const parts = authorization.split(' ');
  if (parts.length !== 2 || parts[0] !== 'Bearer') {
    throw new AuthenticationError('Invalid Authorization header format. Expected: Bearer <key>');
  }

  const key = parts[1];
  if (!key) {
    throw new AuthenticationError('Missing API key in Authorization header');
  }

  return key;
}

/**
 * Constant-time comparison against every configured key
 */
export function isAuthorizedKey(candidate: string, keys: readonly string[]): boolean {
  const candidateBuffer = Buffer.from(candidate);
  let matched = false;

  for (const key of keys) {
    const keyBuffer = Buffer.from(key);
    if (keyBuffer.length === candidateBuffer.length && timingSafeEqual(keyBuffer, candidateBuffer)) {
      matched = true;
    }
  }

  return matched;
}

/**
 * Fastify onRequest hook guarding mutations. With no keys configured every caller is allowed.
 */
export function createAdminAuthHook(keys: readonly string[]): AuthHook {
  return async function adminAuthHook(request: FastifyRequest, reply: FastifyReply): Promise<void> {
    if (keys.length === 0) {
      return;
    }

    try {
      const key = extractBearerToken(request.headers.authorization);
      if (!isAuthorizedKey(key, keys)) {
        throw new AuthenticationError('Invalid API key');
      }
    } catch (error) {
      if (error instanceof AuthenticationError) {
        await reply.code(error.statusCode).send({
          error: error.message,
          code: error.code,
          success: false,
        });
        return;
      }
      throw error;
    }
  };
}
