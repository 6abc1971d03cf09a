/**
 * Private adapter
 * Flat enterprise envelope: `{ [inputKey]: text }` in, `{ [outputKey]: text, ok }` out
 */

import type { FastifyInstance } from 'fastify';
import type { PrivateAdapterConfig } from '../config';
import type { GatewayContext } from '../context';
import { privateAdapterAuth } from '../middleware/auth';
import { sendProblem } from '../problem';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * The input key when it holds a string, else the text of the newest user
 * message in `messages`. Only that message is read: without string content
 * or a text part it yields ''. Text is passed on untrimmed.
 */
export function extractUserText(body: Record<string, unknown>, inputKey: string): string {
  const direct = body[inputKey];
  if (typeof direct === 'string') {
    return direct;
  }
  const messages = Array.isArray(body.messages) ? body.messages : [];
  for (let i = messages.length - 1; i >= 0; i--) {
    const message: unknown = messages[i];
    if (!isRecord(message) || message.role !== 'user') {
      continue;
    }
    if (typeof message.content === 'string') {
      return message.content;
    }
    if (Array.isArray(message.content)) {
      for (const part of message.content) {
        if (isRecord(part) && part.type === 'text') {
          return typeof part.text === 'string' ? part.text : '';
        }
      }
    }
    return '';
  }
  return '';
}

export function envelope(
  text: string,
  body: Record<string, unknown>,
  config: Pick<PrivateAdapterConfig, 'outputKey' | 'traceKey'>
): Record<string, unknown> {
  const result: Record<string, unknown> = { [config.outputKey]: text, ok: true };
  if (body[config.traceKey] !== undefined) {
    result[config.traceKey] = body[config.traceKey];
  }
  return result;
}

export function registerPrivateAdapterRoute(app: FastifyInstance, context: GatewayContext): void {
  const config = context.config.privateAdapter;
  if (!config.enabled) {
    return;
  }

  app.post(config.path, { onRequest: privateAdapterAuth(config) }, async (request, reply) => {
    if (!isRecord(request.body)) {
      return sendProblem(request, reply, 400, 'Expected a JSON object');
    }
    const text = extractUserText(request.body, config.inputKey);
    const output = await context.framework.execute([{ role: 'user', content: text }]);
    return envelope(output, request.body, config);
  });
}
