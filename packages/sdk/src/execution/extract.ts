/**
 * Text Extraction
 * Best-effort pull of the latest user text out of a message list
 */

import type { ChatMessage } from '../types/messages';

/**
 * Returns the newest non-blank user text, trimmed, or '' when there is none.
 *
 * String content is taken as-is; a parts list yields its first non-blank
 * `text` part. A user message with nothing usable is skipped and the scan
 * continues with older messages. Malformed entries are ignored.
 */
export function extractLastUserText(messages: readonly ChatMessage[] | null | undefined): string {
  if (!messages) {
    return '';
  }

  for (let i = messages.length - 1; i >= 0; i--) {
    const message: unknown = messages[i];
    if (!isRecord(message) || message.role !== 'user') {
      continue;
    }
    const text = contentText(message.content);
    if (text) {
      return text;
    }
  }

  return '';
}

/**
 * Text of one message body: trimmed string content, or the first non-blank text part
 */
export function contentText(content: unknown): string {
  if (typeof content === 'string') {
    return content.trim();
  }
  if (Array.isArray(content)) {
    for (const part of content) {
      if (isRecord(part) && part.type === 'text' && typeof part.text === 'string') {
        const text = part.text.trim();
        if (text) {
          return text;
        }
      }
    }
  }
  return '';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
