import type { FastifyReply } from "fastify";

export interface ErrorEnvelope {
  ok: false;
  error: {
    code: string;
    message: string;
  };
}

export function errorEnvelope(code: string, message: string): ErrorEnvelope {
  return { ok: false, error: { code, message } };
}

export function invalidParam(reply: FastifyReply, message: string) {
  return reply.code(400).send(errorEnvelope("INVALID_PARAM", message));
}

export function notFound(reply: FastifyReply, message: string) {
  return reply.code(404).send(errorEnvelope("NOT_FOUND", message));
}
