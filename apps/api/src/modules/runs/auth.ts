import { createHash, timingSafeEqual } from "node:crypto";
import type { FastifyReply, FastifyRequest } from "fastify";

export type AgentTokenSource = () => string | undefined;

const BEARER_PREFIX = "Bearer ";

const envToken: AgentTokenSource = () => process.env.STUDIO_API_TOKEN;

function digest(value: string) {
  return createHash("sha256").update(value).digest();
}

/** Constant-time comparison of two tokens of any length. */
export function tokensMatch(expected: string, actual: string) {
  return timingSafeEqual(digest(expected), digest(actual));
}

/**
 * preHandler guarding the agent-only routes. The token is resolved per request
 * so that a server started before the environment is filled still picks it up.
 */
export function createAgentAuth(resolveToken: AgentTokenSource = envToken) {
  return async function requireAgentAuth(request: FastifyRequest, reply: FastifyReply) {
    const expectedToken = resolveToken();
    if (!expectedToken) {
      request.log.error("Agent token is not configured; rejecting agent request");
      return reply
        .code(500)
        .send({ error: "server_misconfigured", message: "STUDIO_API_TOKEN is not configured." });
    }

    const header = request.headers.authorization;
    const actualToken = header?.startsWith(BEARER_PREFIX) ? header.slice(BEARER_PREFIX.length) : undefined;

    if (!actualToken || !tokensMatch(expectedToken, actualToken)) {
      return reply.code(401).send({ error: "unauthorized", message: "Bearer token required." });
    }
  };
}
