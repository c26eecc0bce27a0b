import pino, { type Logger } from "pino";

/**
 * Root logger, shared by the bot, the store and the webhook server
 */
export const logger = pino({
  name: "file-ledger-bot",
  level: process.env.LOG_LEVEL || "info",
});

/**
 * Create a child logger for one module
 */
export function createModuleLogger(module: string): Logger {
  return logger.child({ module });
}

/**
 * Create a child logger with update context
 */
export function createUpdateLogger(
  parent: Logger,
  userId?: number,
  chatId?: number,
): Logger {
  return parent.child({
    ...(userId !== undefined ? { userId } : {}),
    ...(chatId !== undefined ? { chatId } : {}),
  });
}

export type { Logger };
