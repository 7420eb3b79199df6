import type { FastifyReply, FastifyRequest } from 'fastify';
import { ErrorCode, toErrorEnvelope } from '../errors/taxonomy.js';
import type { LendingService } from '../services/lendingService.js';

const bearerToken = (request: FastifyRequest): string | undefined => {
  const header = request.headers.authorization;
  if (typeof header === 'string' && header.startsWith('Bearer ')) {
    return header.slice('Bearer '.length).trim();
  }
  const apiKey = request.headers['x-api-key'];
  return typeof apiKey === 'string' ? apiKey.trim() : undefined;
};

/** Resolves the caller's userId from its API key, or answers 401 and returns null. */
export const resolveUserFromKey = (
  request: FastifyRequest,
  reply: FastifyReply,
  lending: LendingService,
): string | null => {
  const token = bearerToken(request);
  const userId = token ? lending.resolveApiKey(token) : undefined;

  if (!userId) {
    void reply.code(401).send(toErrorEnvelope(
      ErrorCode.Unauthorized,
      'Missing or invalid API key. Send Authorization: Bearer <apiKey>.',
    ));
    return null;
  }

  return userId;
};

/** Checks the x-admin-key header; answers 403 and returns false on mismatch. */
export const requireAdmin = (
  request: FastifyRequest,
  reply: FastifyReply,
  adminKey: string,
): boolean => {
  if (request.headers['x-admin-key'] === adminKey) return true;

  void reply.code(403).send(toErrorEnvelope(ErrorCode.Unauthorized, 'Admin key required.'));
  return false;
};
