import { Bot } from "grammy";
import type { UserFromGetMe } from "grammy/types";
import { createModuleLogger, createUpdateLogger, type Logger } from "../logger";
import { extractIncomingFile } from "./attachments";
import { parseCommand } from "./commands";
import { REPLY_FAILED_TEXT } from "./messages";
import type { WebhookApi } from "../routes/admin/webhook";
import type { Dispatcher, Reply } from "./types";

// Re-export types
export * from "./types";
export { createDispatcher } from "./dispatcher";

/**
 * The parts of a grammy context used to answer a user
 */
export interface ReplyTarget {
  reply(text: string, other?: { parse_mode?: "Markdown" }): Promise<unknown>;
  replyWithDocument(
    document: string,
    other?: { caption?: string },
  ): Promise<unknown>;
}

export interface CreateBotOptions {
  token: string;
  dispatcher: Dispatcher;
  logger?: Logger;
  /** Skips the getMe call on startup when known */
  botInfo?: UserFromGetMe;
}

export const ATTACHMENT_QUERIES = [
  "message:document",
  "message:photo",
  "message:video",
  "message:audio",
  "message:voice",
  "message:video_note",
] as const;

/**
 * Send the dispatcher's replies in order.
 * A text the platform refuses is logged and replaced by a plain failure notice.
 * A document the platform refuses is logged and answered with the reply's failure text.
 */
export async function deliverReplies(
  target: ReplyTarget,
  replies: readonly Reply[],
  log: Logger,
): Promise<void> {
  for (const reply of replies) {
    if (reply.kind === "text") {
      try {
        await target.reply(
          reply.text,
          reply.markdown ? { parse_mode: "Markdown" } : undefined,
        );
      } catch (error) {
        log.error(
          { err: error, length: reply.text.length },
          "Failed to send reply",
        );
        await target.reply(REPLY_FAILED_TEXT);
      }
      continue;
    }

    try {
      await target.replyWithDocument(reply.fileId, { caption: reply.caption });
    } catch (error) {
      log.error({ err: error, fileId: reply.fileId }, "Failed to send document");
      await target.reply(reply.failure.text, {
        parse_mode: reply.failure.markdown ? "Markdown" : undefined,
      });
      continue;
    }

    await target.reply(reply.confirmation.text, {
      parse_mode: reply.confirmation.markdown ? "Markdown" : undefined,
    });
  }
}

/**
 * Create the Telegram bot and register its message handlers
 */
export function createBot(options: CreateBotOptions): Bot {
  const { token, dispatcher } = options;
  const botLogger = options.logger ?? createModuleLogger("bot");
  const bot = new Bot(token, { botInfo: options.botInfo });

  bot.on("message:text", async (ctx) => {
    const parsed = parseCommand(ctx.message.text, ctx.me.username);
    const userId = ctx.from?.id;
    if (!parsed || userId === undefined) {
      return;
    }

    const log = createUpdateLogger(botLogger, userId, ctx.message.chat.id);
    log.info({ command: parsed.command }, "Command received");

    const replies = await dispatcher.handle({
      kind: "command",
      userId,
      command: parsed.command,
      args: parsed.args,
    });
    await deliverReplies(ctx, replies, log);
  });

  bot.on([...ATTACHMENT_QUERIES], async (ctx) => {
    const file = extractIncomingFile(ctx.message);
    const userId = ctx.from?.id;
    if (!file || userId === undefined) {
      return;
    }

    const log = createUpdateLogger(botLogger, userId, ctx.message.chat.id);
    log.info(
      { fileName: file.fileName, fileSize: file.fileSize },
      "File received",
    );

    const replies = await dispatcher.handle({ kind: "file", userId, file });
    await deliverReplies(ctx, replies, log);
  });

  bot.catch((err) => {
    botLogger.error(
      { err: err.error, updateId: err.ctx.update.update_id },
      "Error while handling update",
    );
  });

  return bot;
}

/**
 * Webhook management calls bound to a bot
 */
export function createWebhookApi(bot: Bot, secretToken?: string): WebhookApi {
  return {
    setWebhook: (url) =>
      bot.api.setWebhook(url, {
        drop_pending_updates: true,
        allowed_updates: ["message"],
        ...(secretToken !== undefined ? { secret_token: secretToken } : {}),
      }),
    getWebhookInfo: () => bot.api.getWebhookInfo(),
    deleteWebhook: () => bot.api.deleteWebhook({ drop_pending_updates: true }),
  };
}
