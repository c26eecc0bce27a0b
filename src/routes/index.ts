import type { FastifyInstance } from "fastify";
import type { DatabaseHandle } from "../db";
import { webhookAdminRoutes, type WebhookApi } from "./admin/webhook";
import { healthRoutes } from "./health";
import { webhookRoutes, type WebhookHandler } from "./webhook";

export interface RouteDeps {
  database: Pick<DatabaseHandle, "testConnection">;
  webhookHandler: WebhookHandler;
  webhookApi: WebhookApi;
  adminApiKey?: string;
}

/**
 * Register all application routes
 */
export async function registerRoutes(
  fastify: FastifyInstance,
  deps: RouteDeps,
): Promise<void> {
  // Health check (no prefix, no auth)
  await fastify.register(healthRoutes, { database: deps.database });

  // Telegram updates
  await fastify.register(webhookRoutes, { handler: deps.webhookHandler });

  // Admin routes
  await fastify.register(webhookAdminRoutes, {
    prefix: "/api/v1/admin/webhook",
    webhookApi: deps.webhookApi,
    adminApiKey: deps.adminApiKey,
  });
}
