import { z } from "zod";
import { validate } from "../schemas";
import { GIB } from "../utils/size";
import type { Limits } from "../bot/messages";

const byteCount = z.coerce.number().int().nonnegative();

const optionalSecret = z
  .string()
  .optional()
  .transform((value) => (value && value.length > 0 ? value : undefined));

export const envSchema = z.object({
  TELEGRAM_BOT_TOKEN: z.string().min(1, "TELEGRAM_BOT_TOKEN is required"),
  BOT_MODE: z.enum(["polling", "webhook"]).default("polling"),
  DATABASE_FILE: z.string().min(1).default("file_storage.db"),
  MAX_UPLOAD_SIZE: byteCount.default(4 * GIB),
  TELEGRAM_FILE_SIZE_LIMIT: byteCount.default(2 * GIB),
  MAX_DOWNLOAD_SIZE: byteCount.default(10 * GIB),
  MAX_FILES_PER_USER: z.coerce.number().int().positive().default(100),
  HOST: z.string().min(1).default("0.0.0.0"),
  PORT: z.coerce.number().int().min(1).max(65535).default(5000),
  WEBHOOK_SECRET: optionalSecret,
  ADMIN_API_KEY: optionalSecret,
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
});

export interface Config {
  botToken: string;
  mode: "polling" | "webhook";
  databaseFile: string;
  limits: Limits;
  host: string;
  port: number;
  webhookSecret?: string;
  adminApiKey?: string;
  logLevel: string;
}

/**
 * Read configuration from environment variables
 * Throws ValidationError naming every invalid variable
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): Config {
  const parsed = validate(envSchema, env);

  return {
    botToken: parsed.TELEGRAM_BOT_TOKEN,
    mode: parsed.BOT_MODE,
    databaseFile: parsed.DATABASE_FILE,
    limits: {
      maxUploadSize: parsed.MAX_UPLOAD_SIZE,
      platformFileSizeLimit: parsed.TELEGRAM_FILE_SIZE_LIMIT,
      maxDownloadSize: parsed.MAX_DOWNLOAD_SIZE,
      maxFilesPerUser: parsed.MAX_FILES_PER_USER,
    },
    host: parsed.HOST,
    port: parsed.PORT,
    webhookSecret: parsed.WEBHOOK_SECRET,
    adminApiKey: parsed.ADMIN_API_KEY,
    logLevel: parsed.LOG_LEVEL,
  };
}
