import { FastifyReply, FastifyRequest } from 'fastify';
import { failure } from '../utils/response';

export const requireAuth = async (request: FastifyRequest, reply: FastifyReply): Promise<void> => {
  try {
    await request.jwtVerify();
  } catch {
    reply.code(401).send(failure('UNAUTHORIZED', 'Unauthorized'));
  }
};

/** The acting user id carried in the verified token. */
export const actingUserId = (request: FastifyRequest): number => request.user.sub;
