import "dotenv/config";
import { webhookCallback } from "grammy";
import { buildApp } from "./app";
import { createBot, createDispatcher, createWebhookApi } from "./bot";
import { loadConfig } from "./config";
import { openDatabase } from "./db";
import { logger } from "./logger";
import { createFileStore } from "./services/files";

function onShutdownError(error: unknown): void {
  logger.error({ err: error }, "Error during shutdown");
  process.exitCode = 1;
}

async function main(): Promise<void> {
  const config = loadConfig();

  const database = openDatabase(config.databaseFile);
  const store = createFileStore({ db: database.db });
  const dispatcher = createDispatcher({ store, limits: config.limits });
  const bot = createBot({ token: config.botToken, dispatcher });

  logger.info(
    { mode: config.mode, databaseFile: config.databaseFile },
    "Starting file ledger bot",
  );

  if (config.mode === "polling") {
    const shutdown = async (signal: string) => {
      logger.info({ signal }, "Stopping bot");
      await bot.stop();
      database.close();
    };
    process.once("SIGINT", (signal) => shutdown(signal).catch(onShutdownError));
    process.once("SIGTERM", (signal) => shutdown(signal).catch(onShutdownError));

    await bot.start({
      allowed_updates: ["message"],
      onStart: (me) => logger.info({ username: me.username }, "Polling for updates"),
    });
    return;
  }

  const app = await buildApp({
    database,
    webhookHandler: webhookCallback(bot, "fastify", {
      secretToken: config.webhookSecret,
    }),
    webhookApi: createWebhookApi(bot, config.webhookSecret),
    adminApiKey: config.adminApiKey,
    logLevel: config.logLevel,
  });

  const shutdown = async (signal: string) => {
    logger.info({ signal }, "Stopping webhook server");
    await app.close();
    database.close();
  };
  process.once("SIGINT", (signal) => shutdown(signal).catch(onShutdownError));
  process.once("SIGTERM", (signal) => shutdown(signal).catch(onShutdownError));

  await app.listen({ host: config.host, port: config.port });
  logger.info(
    { host: config.host, port: config.port },
    "Webhook server listening on POST /webhook",
  );
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, "Failed to start");
  process.exit(1);
});
