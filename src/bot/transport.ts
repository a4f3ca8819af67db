/**
 * Outbound chat transport over the grammY Bot API client.
 */

import { type Api, GrammyError, InputFile } from "grammy";
import { OutputTooLargeError } from "../services/errors.ts";
import type { Identity } from "../services/download-queue.ts";

// ============================================================================
// Types
// ============================================================================

/**
 * What the core needs from the chat side. User texts are HTML,
 * operator texts are plain.
 */
export interface ChatTransport {
  sendText(identity: Identity, text: string): Promise<void>;
  /** Send a message that is edited later. Resolves to its message id. */
  sendStatus(identity: Identity, text: string): Promise<number>;
  editText(identity: Identity, messageId: number, text: string): Promise<void>;
  sendDocument(identity: Identity, filePath: string, caption: string): Promise<void>;
  notifyOperator(text: string): Promise<void>;
}

export interface GrammyTransportOptions {
  operatorChatId: number;
  /** Bot API upload limit, reported on OutputTooLargeError */
  maxOutputSizeBytes: number;
}

/** Telegram rejects messages longer than this */
export const MAX_MESSAGE_LENGTH = 4096;

// ============================================================================
// Helpers
// ============================================================================

/**
 * True when the Bot API rejected an upload for its size.
 */
export function isTooLargeError(error: unknown): boolean {
  return (
    error instanceof GrammyError &&
    (error.error_code === 413 || /too (large|big)/i.test(error.description))
  );
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}

// ============================================================================
// Transport Factory
// ============================================================================

/**
 * Create a chat transport backed by a grammY Api instance.
 */
export function createGrammyTransport(
  api: Api,
  options: GrammyTransportOptions,
): ChatTransport {
  return {
    async sendText(identity, text) {
      await api.sendMessage(identity, truncate(text, MAX_MESSAGE_LENGTH), {
        parse_mode: "HTML",
        link_preview_options: { is_disabled: true },
      });
    },

    async sendStatus(identity, text) {
      const message = await api.sendMessage(identity, truncate(text, MAX_MESSAGE_LENGTH), {
        parse_mode: "HTML",
        link_preview_options: { is_disabled: true },
      });
      return message.message_id;
    },

    async editText(identity, messageId, text) {
      await api.editMessageText(identity, messageId, truncate(text, MAX_MESSAGE_LENGTH), {
        parse_mode: "HTML",
        link_preview_options: { is_disabled: true },
      });
    },

    async sendDocument(identity, filePath, caption) {
      try {
        await api.sendDocument(identity, new InputFile(filePath), {
          caption,
          parse_mode: "HTML",
        });
      } catch (error) {
        if (isTooLargeError(error)) {
          throw new OutputTooLargeError(null, options.maxOutputSizeBytes, { filePath });
        }
        throw error;
      }
    },

    async notifyOperator(text) {
      await api.sendMessage(options.operatorChatId, truncate(text, MAX_MESSAGE_LENGTH));
    },
  };
}
