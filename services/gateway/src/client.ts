/**
 * Gateway Client
 * Sends one text message to a running gateway over /a2a or /rpc
 */

import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { z } from 'zod';

export const DEFAULT_CLIENT_TIMEOUT_MS = 20_000;

const ReplySchema = z.object({
  message: z
    .object({
      parts: z.array(z.object({ type: z.string().optional(), text: z.string().optional() }).passthrough()).default([])
    })
    .passthrough()
    .optional()
});

const RpcReplySchema = z.object({
  result: ReplySchema.optional(),
  error: z.object({ code: z.number(), message: z.string() }).optional()
});

export interface SendOptions {
  jsonrpc?: boolean;
}

export class GatewayClient {
  private readonly http: AxiosInstance;
  private readonly baseUrl: string;

  constructor(baseUrl: string, http?: AxiosInstance) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.http = http ?? axios.create({ timeout: DEFAULT_CLIENT_TIMEOUT_MS });
  }

  /**
   * Send `text` and return the first text part of the agent's reply
   */
  async send(text: string, options: SendOptions = {}): Promise<string> {
    const message = { role: 'user', messageId: 'cli', parts: [{ type: 'text', text }] };

    if (options.jsonrpc) {
      const response = await this.http.post(`${this.baseUrl}/rpc`, {
        jsonrpc: '2.0',
        id: '1',
        method: 'message/send',
        params: { message }
      });
      const body = RpcReplySchema.parse(response.data);
      if (body.error) {
        throw new Error(`JSON-RPC error ${body.error.code}: ${body.error.message}`);
      }
      return firstText(body.result);
    }

    const response = await this.http.post(`${this.baseUrl}/a2a`, {
      method: 'message/send',
      params: { message }
    });
    return firstText(ReplySchema.parse(response.data));
  }

  async card(): Promise<unknown> {
    const response = await this.http.get(`${this.baseUrl}/.well-known/agent-card.json`);
    return response.data;
  }
}

function firstText(reply: z.infer<typeof ReplySchema> | undefined): string {
  for (const part of reply?.message?.parts ?? []) {
    if (part.type === 'text') {
      return part.text ?? '';
    }
  }
  return '';
}
