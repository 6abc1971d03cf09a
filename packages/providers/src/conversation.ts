/**
 * Conversation Mapping
 * Prompt resolution and history flattening shared by the HTTP providers
 */

import { contentText, extractLastUserText } from '@switchboard/sdk';
import type { ChatMessage } from '@switchboard/sdk';

export const DEFAULT_PROMPT = 'Say hello.';

export type TurnRole = 'system' | 'user' | 'assistant';

export interface Turn {
  role: TurnRole;
  content: string;
}

const ROLE_MAP: Readonly<Record<string, TurnRole>> = {
  system: 'system',
  developer: 'system',
  user: 'user',
  assistant: 'assistant',
  agent: 'assistant',
  model: 'assistant'
};

/**
 * The text actually sent: the prompt, else the latest user text, else a greeting
 */
export function resolvePrompt(prompt: string, messages: readonly ChatMessage[]): string {
  return (prompt ?? '').trim() || extractLastUserText(messages) || DEFAULT_PROMPT;
}

/**
 * Text turns of the history, ending with `prompt` as the user turn.
 * Roles other than system, user and assistant (tools and the like) are dropped.
 */
export function toTurns(prompt: string, messages: readonly ChatMessage[]): Turn[] {
  const turns: Turn[] = [];
  for (const message of messages) {
    const key = String(message?.role ?? '').toLowerCase();
    const content = contentText(message?.content);
    if (Object.hasOwn(ROLE_MAP, key) && content) {
      turns.push({ role: ROLE_MAP[key], content });
    }
  }

  const last = turns[turns.length - 1];
  if (!last || last.role !== 'user' || last.content !== prompt) {
    turns.push({ role: 'user', content: prompt });
  }
  return turns;
}

/**
 * Split system turns off, for APIs that take them separately. The remaining
 * turns start with a user turn.
 */
export function splitSystem(turns: readonly Turn[]): { system: string; dialog: Turn[] } {
  const system = turns
    .filter((turn) => turn.role === 'system')
    .map((turn) => turn.content)
    .join('\n');

  const dialog = turns.filter((turn) => turn.role !== 'system');
  const firstUser = dialog.findIndex((turn) => turn.role === 'user');
  return { system, dialog: firstUser > 0 ? dialog.slice(firstUser) : dialog };
}
