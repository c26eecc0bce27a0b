import type { FileStore } from "../services/files";
import { createModuleLogger, type Logger } from "../logger";
import { hasErrorCode, isSuccess } from "../types/result";
import { validateDownloadSize, validateUploadSize } from "../utils/size";
import { isKnownCommand, type CommandName } from "./commands";
import {
  GENERIC_ERROR_TEXT,
  INSERT_CONFLICT_TEXT,
  DOWNLOAD_FAILED_TEXT,
  deletedText,
  downloadCaption,
  downloadCompleteText,
  duplicateNameText,
  fileDetailsText,
  fileListTexts,
  helpText,
  notFoundText,
  quotaExceededText,
  statsText,
  uploadInfoText,
  uploadSuccessText,
  usageText,
  welcomeText,
  type Action,
  type Limits,
} from "./messages";
import { computeStorageStats } from "./stats";
import type {
  CommandEvent,
  Dispatcher,
  FileEvent,
  InboundEvent,
  Reply,
  TextReply,
} from "./types";

export interface DispatcherDeps {
  store: FileStore;
  limits: Limits;
  logger?: Logger;
}

function text(body: string): TextReply {
  return { kind: "text", text: body, markdown: true };
}

function genericError(action: Action): Reply[] {
  return [text(GENERIC_ERROR_TEXT[action])];
}

/**
 * Create the command dispatcher.
 * Every event is resolved against the store's current contents; nothing is kept between events.
 */
export function createDispatcher(deps: DispatcherDeps): Dispatcher {
  const { store, limits } = deps;
  const log = deps.logger ?? createModuleLogger("dispatcher");

  // ============================================
  // Upload
  // ============================================

  async function handleUpload(event: FileEvent): Promise<Reply[]> {
    const { userId, file } = event;

    const countResult = await store.countForUser(userId);
    if (!isSuccess(countResult)) {
      return genericError("upload");
    }
    if (countResult.data >= limits.maxFilesPerUser) {
      log.info(
        { userId, count: countResult.data, max: limits.maxFilesPerUser },
        "Upload refused: quota reached",
      );
      return [text(quotaExceededText(limits.maxFilesPerUser))];
    }

    const sizeCheck = validateUploadSize(file.fileSize, limits);
    if (!sizeCheck.ok) {
      log.info(
        { userId, fileName: file.fileName, fileSize: file.fileSize },
        "Upload refused: file too large",
      );
      return [text(`❌ ${sizeCheck.reason}`)];
    }

    const existing = await store.findByName(userId, file.fileName);
    if (isSuccess(existing)) {
      return [text(duplicateNameText(file.fileName))];
    }
    if (!hasErrorCode(existing, "NOT_FOUND")) {
      return genericError("upload");
    }

    const inserted = await store.insert({
      userId,
      fileId: file.fileId,
      fileName: file.fileName,
      fileSize: file.fileSize,
      mimeType: file.mimeType ?? null,
      fileUniqueId: file.fileUniqueId,
    });

    if (hasErrorCode(inserted, "CONFLICT")) {
      return [text(INSERT_CONFLICT_TEXT)];
    }
    if (!isSuccess(inserted)) {
      return genericError("upload");
    }

    log.info({ userId, fileName: file.fileName }, "File uploaded");
    return [text(uploadSuccessText(file))];
  }

  // ============================================
  // Commands
  // ============================================

  async function handleList(userId: number): Promise<Reply[]> {
    const result = await store.listByUser(userId);
    if (!isSuccess(result)) {
      return genericError("list");
    }
    return fileListTexts(result.data).map(text);
  }

  async function handleStats(userId: number): Promise<Reply[]> {
    const result = await store.listByUser(userId);
    if (!isSuccess(result)) {
      return genericError("stats");
    }
    const stats = computeStorageStats(result.data);
    return [text(statsText(stats, limits.maxFilesPerUser))];
  }

  async function handleDetails(userId: number, fileName: string): Promise<Reply[]> {
    const result = await store.findByName(userId, fileName);
    if (hasErrorCode(result, "NOT_FOUND")) {
      return [text(notFoundText(fileName))];
    }
    if (!isSuccess(result)) {
      return genericError("details");
    }
    return [text(fileDetailsText(result.data))];
  }

  async function handleDownload(userId: number, fileName: string): Promise<Reply[]> {
    const result = await store.findByName(userId, fileName);
    if (hasErrorCode(result, "NOT_FOUND")) {
      return [text(notFoundText(fileName))];
    }
    if (!isSuccess(result)) {
      return genericError("download");
    }

    const record = result.data;
    const sizeCheck = validateDownloadSize(record.fileSize, limits);
    if (!sizeCheck.ok) {
      return [text(`❌ ${sizeCheck.reason}`)];
    }

    return [
      {
        kind: "document",
        fileId: record.fileId,
        caption: downloadCaption(record),
        confirmation: text(downloadCompleteText(record)),
        failure: text(DOWNLOAD_FAILED_TEXT),
      },
    ];
  }

  async function handleDelete(userId: number, fileName: string): Promise<Reply[]> {
    const result = await store.deleteByName(userId, fileName);
    if (hasErrorCode(result, "NOT_FOUND")) {
      return [text(notFoundText(fileName))];
    }
    if (!isSuccess(result)) {
      return genericError("delete");
    }

    log.info({ userId, fileName }, "File deleted");
    return [text(deletedText(result.data))];
  }

  async function handleCommand(
    event: CommandEvent,
    command: CommandName,
  ): Promise<Reply[]> {
    const { userId, args } = event;

    switch (command) {
      case "start":
        return [text(welcomeText(limits))];
      case "help":
        return [text(helpText(limits))];
      case "upload":
        return [text(uploadInfoText(limits))];
      case "list":
        return handleList(userId);
      case "stats":
        return handleStats(userId);
      case "details":
      case "download":
      case "delete": {
        if (args.trim().length === 0) {
          return [text(usageText(command))];
        }
        if (command === "details") {
          return handleDetails(userId, args);
        }
        if (command === "download") {
          return handleDownload(userId, args);
        }
        return handleDelete(userId, args);
      }
    }
  }

  return {
    async handle(event: InboundEvent): Promise<Reply[]> {
      if (event.kind === "file") {
        return handleUpload(event);
      }

      if (!isKnownCommand(event.command)) {
        log.debug({ command: event.command }, "Ignoring unknown command");
        return [];
      }

      return handleCommand(event, event.command);
    },
  };
}
