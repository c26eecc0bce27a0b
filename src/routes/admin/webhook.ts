import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import type { WebhookInfo } from "grammy/types";
import { UpstreamError } from "../../errors";
import { requireAdmin } from "../../middleware/auth";
import { validate, setWebhookSchema } from "../../schemas";

/**
 * Webhook management calls on the Telegram API
 */
export interface WebhookApi {
  setWebhook(url: string): Promise<boolean>;
  getWebhookInfo(): Promise<WebhookInfo>;
  deleteWebhook(): Promise<boolean>;
}

export interface WebhookAdminRoutesOptions {
  webhookApi: WebhookApi;
  adminApiKey?: string;
}

/**
 * Webhook admin routes
 * Base path: /api/v1/admin/webhook
 */
export async function webhookAdminRoutes(
  fastify: FastifyInstance,
  options: WebhookAdminRoutesOptions,
): Promise<void> {
  const { webhookApi } = options;

  fastify.addHook("preHandler", requireAdmin(options.adminApiKey));

  // ============================================
  // POST /webhook - Point Telegram at a URL
  // ============================================
  fastify.post("/", async (request: FastifyRequest, reply: FastifyReply) => {
    const { url } = validate(setWebhookSchema, request.body);

    let ok: boolean;
    try {
      ok = await webhookApi.setWebhook(url);
    } catch (error) {
      request.log.error({ err: error, url }, "Failed to set webhook");
      throw new UpstreamError("Failed to set webhook");
    }

    if (!ok) {
      throw new UpstreamError("Telegram refused the webhook", { url });
    }

    request.log.info({ url }, "Webhook set");
    return reply.send({ status: "success", webhookUrl: url });
  });

  // ============================================
  // GET /webhook - Current webhook state
  // ============================================
  fastify.get("/", async (request: FastifyRequest, reply: FastifyReply) => {
    let info: WebhookInfo;
    try {
      info = await webhookApi.getWebhookInfo();
    } catch (error) {
      request.log.error({ err: error }, "Failed to get webhook info");
      throw new UpstreamError("Failed to get webhook info");
    }

    return reply.send({
      url: info.url,
      hasCustomCertificate: info.has_custom_certificate,
      pendingUpdateCount: info.pending_update_count,
      lastErrorDate:
        info.last_error_date !== undefined
          ? new Date(info.last_error_date * 1000).toISOString()
          : null,
      lastErrorMessage: info.last_error_message ?? null,
      maxConnections: info.max_connections ?? null,
      allowedUpdates: info.allowed_updates ?? null,
    });
  });

  // ============================================
  // DELETE /webhook - Back to polling
  // ============================================
  fastify.delete("/", async (request: FastifyRequest, reply: FastifyReply) => {
    let ok: boolean;
    try {
      ok = await webhookApi.deleteWebhook();
    } catch (error) {
      request.log.error({ err: error }, "Failed to delete webhook");
      throw new UpstreamError("Failed to delete webhook");
    }

    if (!ok) {
      throw new UpstreamError("Telegram refused to delete the webhook");
    }

    request.log.info("Webhook deleted");
    return reply.send({ status: "success" });
  });
}
