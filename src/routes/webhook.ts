import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";

export type WebhookHandler = (
  request: FastifyRequest,
  reply: FastifyReply,
) => Promise<unknown>;

export interface WebhookRoutesOptions {
  handler: WebhookHandler;
}

/**
 * Telegram update endpoint
 * Authenticated by grammy through the secret token header, when one is configured
 */
export async function webhookRoutes(
  fastify: FastifyInstance,
  options: WebhookRoutesOptions,
): Promise<void> {
  fastify.post("/webhook", async (request, reply) => {
    await options.handler(request, reply);
    return reply;
  });
}
