/**
 * OpenAI-compatible chat completions
 * Non-streaming only; usage counts are not tracked and reported as zero.
 */

import type { FastifyInstance } from 'fastify';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import type { ChatMessage } from '@switchboard/sdk';
import { describeIssues } from '../a2a';
import type { GatewayContext } from '../context';
import { sendProblem } from '../problem';

export const DEFAULT_MODEL = 'switchboard';

const ContentPartSchema = z.union([
  z.string(),
  z.object({ type: z.string().optional(), text: z.string().optional() }).passthrough()
]);

export const ChatCompletionRequestSchema = z
  .object({
    model: z.string().optional(),
    messages: z
      .array(
        z
          .object({
            role: z.string(),
            content: z.union([z.string(), z.array(ContentPartSchema), z.null()]).optional()
          })
          .passthrough()
      )
      .min(1)
  })
  .passthrough();

type ContentInput = z.infer<typeof ContentPartSchema>[] | string | null | undefined;

/**
 * Flatten OpenAI content into plain text: string parts and text parts joined by newlines
 */
export function contentToText(content: ContentInput): string {
  if (typeof content === 'string') {
    return content;
  }
  if (!content) {
    return '';
  }
  const pieces: string[] = [];
  for (const part of content) {
    if (typeof part === 'string') {
      pieces.push(part);
    } else if (part.type === 'text' && typeof part.text === 'string') {
      pieces.push(part.text);
    }
  }
  return pieces.join('\n');
}

export function registerOpenAIRoutes(app: FastifyInstance, context: GatewayContext): void {
  app.post('/openai/v1/chat/completions', async (request, reply) => {
    const parsed = ChatCompletionRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      return sendProblem(request, reply, 400, `Invalid chat completion request: ${describeIssues(parsed.error)}`);
    }

    const messages: ChatMessage[] = parsed.data.messages.map((message) => ({
      role: message.role,
      content: contentToText(message.content)
    }));
    const content = await context.framework.execute(messages);

    return {
      id: `chatcmpl-${uuidv4()}`,
      object: 'chat.completion',
      created: Math.floor(Date.now() / 1000),
      model: parsed.data.model ?? DEFAULT_MODEL,
      choices: [
        {
          index: 0,
          message: { role: 'assistant', content },
          finish_reason: 'stop'
        }
      ],
      usage: { prompt_tokens: 0, completion_tokens: 0, total_tokens: 0 }
    };
  });
}
