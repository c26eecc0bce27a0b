import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from "vitest";
import type { FastifyInstance } from "fastify";
import { buildApp } from "../../../src/app";
import type { WebhookApi } from "../../../src/routes/admin/webhook";
import type { WebhookHandler } from "../../../src/routes/webhook";

const ADMIN_KEY = "test-admin-key";
const BASE = "/api/v1/admin/webhook";

function createWebhookApi() {
  return {
    setWebhook: vi.fn<WebhookApi["setWebhook"]>().mockResolvedValue(true),
    getWebhookInfo: vi.fn<WebhookApi["getWebhookInfo"]>(),
    deleteWebhook: vi.fn<WebhookApi["deleteWebhook"]>().mockResolvedValue(true),
  } satisfies WebhookApi;
}

describe("webhook routes", () => {
  let app: FastifyInstance;
  let webhookApi: ReturnType<typeof createWebhookApi>;
  let webhookHandler: Mock<WebhookHandler>;

  beforeEach(async () => {
    webhookApi = createWebhookApi();
    webhookHandler = vi.fn<WebhookHandler>(async (_request, reply) =>
      reply.status(200).send({ ok: true }),
    );
    app = await buildApp({
      database: { testConnection: () => true },
      webhookHandler,
      webhookApi,
      adminApiKey: ADMIN_KEY,
      logLevel: "silent",
    });
  });

  afterEach(async () => {
    await app.close();
  });

  describe("POST /webhook", () => {
    it("hands the update to the bot", async () => {
      const update = { update_id: 42, message: { message_id: 1, text: "/list" } };

      const response = await app.inject({ method: "POST", url: "/webhook", payload: update });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ ok: true });
      expect(webhookHandler).toHaveBeenCalledTimes(1);
      expect(webhookHandler.mock.calls[0]?.[0].body).toEqual(update);
    });
  });

  describe("admin authentication", () => {
    it("requires the API key header", async () => {
      const response = await app.inject({ method: "GET", url: BASE });

      expect(response.statusCode).toBe(401);
      expect(response.json()).toEqual({
        error: { code: "UNAUTHORIZED", message: "API key required" },
      });
      expect(webhookApi.getWebhookInfo).not.toHaveBeenCalled();
    });

    it("rejects a wrong key", async () => {
      const response = await app.inject({
        method: "DELETE",
        url: BASE,
        headers: { "x-api-key": "wrong-key" },
      });

      expect(response.statusCode).toBe(401);
      expect(response.json().error.message).toBe("Invalid admin API key");
      expect(webhookApi.deleteWebhook).not.toHaveBeenCalled();
    });

    it("refuses everything when no admin key is configured", async () => {
      const unkeyed = await buildApp({
        database: { testConnection: () => true },
        webhookHandler,
        webhookApi,
        logLevel: "silent",
      });

      const response = await unkeyed.inject({
        method: "GET",
        url: BASE,
        headers: { "x-api-key": ADMIN_KEY },
      });
      await unkeyed.close();

      expect(response.statusCode).toBe(401);
      expect(response.json().error.message).toBe("Admin API key not configured");
    });
  });

  describe("POST /api/v1/admin/webhook", () => {
    it("sets the webhook", async () => {
      const response = await app.inject({
        method: "POST",
        url: BASE,
        headers: { "x-api-key": ADMIN_KEY },
        payload: { url: "https://bot.example.com/webhook" },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        status: "success",
        webhookUrl: "https://bot.example.com/webhook",
      });
      expect(webhookApi.setWebhook).toHaveBeenCalledWith("https://bot.example.com/webhook");
    });

    it("rejects a plain http URL", async () => {
      const response = await app.inject({
        method: "POST",
        url: BASE,
        headers: { "x-api-key": ADMIN_KEY },
        payload: { url: "http://bot.example.com/webhook" },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        error: {
          code: "VALIDATION_ERROR",
          message: "Validation failed",
          details: { errors: [{ path: "url", message: "Webhook URL must use https" }] },
        },
      });
      expect(webhookApi.setWebhook).not.toHaveBeenCalled();
    });

    it("reports a refusal from Telegram as 502", async () => {
      webhookApi.setWebhook.mockResolvedValue(false);

      const response = await app.inject({
        method: "POST",
        url: BASE,
        headers: { "x-api-key": ADMIN_KEY },
        payload: { url: "https://bot.example.com/webhook" },
      });

      expect(response.statusCode).toBe(502);
      expect(response.json()).toEqual({
        error: {
          code: "UPSTREAM_ERROR",
          message: "Telegram refused the webhook",
          details: { url: "https://bot.example.com/webhook" },
        },
      });
    });

    it("reports a failed call as 502", async () => {
      webhookApi.setWebhook.mockRejectedValue(new Error("socket hang up"));

      const response = await app.inject({
        method: "POST",
        url: BASE,
        headers: { "x-api-key": ADMIN_KEY },
        payload: { url: "https://bot.example.com/webhook" },
      });

      expect(response.statusCode).toBe(502);
      expect(response.json().error.message).toBe("Failed to set webhook");
    });
  });

  describe("GET /api/v1/admin/webhook", () => {
    it("maps the webhook info", async () => {
      webhookApi.getWebhookInfo.mockResolvedValue({
        url: "https://bot.example.com/webhook",
        has_custom_certificate: false,
        pending_update_count: 3,
        last_error_date: 1700000000,
        last_error_message: "Connection timed out",
        max_connections: 40,
        allowed_updates: ["message"],
      });

      const response = await app.inject({
        method: "GET",
        url: BASE,
        headers: { "x-api-key": ADMIN_KEY },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        url: "https://bot.example.com/webhook",
        hasCustomCertificate: false,
        pendingUpdateCount: 3,
        lastErrorDate: "2023-11-14T22:13:20.000Z",
        lastErrorMessage: "Connection timed out",
        maxConnections: 40,
        allowedUpdates: ["message"],
      });
    });

    it("uses null for fields Telegram left out", async () => {
      webhookApi.getWebhookInfo.mockResolvedValue({
        url: "",
        has_custom_certificate: false,
        pending_update_count: 0,
      });

      const response = await app.inject({
        method: "GET",
        url: BASE,
        headers: { "x-api-key": ADMIN_KEY },
      });

      expect(response.json()).toEqual({
        url: "",
        hasCustomCertificate: false,
        pendingUpdateCount: 0,
        lastErrorDate: null,
        lastErrorMessage: null,
        maxConnections: null,
        allowedUpdates: null,
      });
    });
  });

  describe("DELETE /api/v1/admin/webhook", () => {
    it("deletes the webhook", async () => {
      const response = await app.inject({
        method: "DELETE",
        url: BASE,
        headers: { "x-api-key": ADMIN_KEY },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ status: "success" });
      expect(webhookApi.deleteWebhook).toHaveBeenCalledTimes(1);
    });

    it("reports a refusal from Telegram as 502", async () => {
      webhookApi.deleteWebhook.mockResolvedValue(false);

      const response = await app.inject({
        method: "DELETE",
        url: BASE,
        headers: { "x-api-key": ADMIN_KEY },
      });

      expect(response.statusCode).toBe(502);
      expect(response.json().error.code).toBe("UPSTREAM_ERROR");
    });
  });
});
