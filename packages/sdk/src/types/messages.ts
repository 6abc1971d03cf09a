/**
 * Conversation Types
 * The universal message shape shared by providers, frameworks and the gateway
 */

/**
 * One part of a multi-part message body (OpenAI-style content arrays)
 */
export interface ContentPart {
  type: string;
  text?: string;
  [key: string]: unknown;
}

export type MessageContent = string | ContentPart[] | null;

/**
 * A single conversation turn. `role` is left open: clients send
 * 'system', 'user', 'assistant', 'agent', 'tool' and more.
 */
export interface ChatMessage {
  role: string;
  content?: MessageContent;
}

/**
 * A value that is either ready now or arrives later
 */
export type Awaitable<T> = T | Promise<T>;
