/**
 * A2A Message Model
 * Request schemas and reply builders shared by /a2a and /rpc
 */

import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';

export const PartSchema = z
  .object({
    type: z.string().optional(),
    kind: z.string().optional(),
    text: z.string().optional()
  })
  .passthrough();

export const IncomingMessageSchema = z
  .object({
    role: z.string().optional(),
    messageId: z.string().optional(),
    parts: z.array(PartSchema)
  })
  .passthrough();

export const MessageSendParamsSchema = z.object({
  message: IncomingMessageSchema
});

/**
 * Only the method is checked; the message is read leniently by `paramsText`
 */
export const A2ARequestSchema = z.object({
  method: z.literal('message/send'),
  params: z.unknown()
});

/**
 * Envelope checked before the method is dispatched
 */
export const JsonRpcEnvelopeSchema = z.object({
  jsonrpc: z.literal('2.0').default('2.0'),
  id: z.union([z.string(), z.number()]),
  method: z.string().min(1),
  params: z.unknown()
});

export type JsonRpcId = string | number | null;

export const JSONRPC_PARSE_ERROR = -32700;
export const JSONRPC_INVALID_REQUEST = -32600;
export const JSONRPC_METHOD_NOT_FOUND = -32601;

export interface AgentMessage {
  role: 'agent';
  messageId: string;
  parts: Array<{ type: 'text'; text: string }>;
}

export interface JsonRpcError {
  jsonrpc: '2.0';
  id: JsonRpcId;
  error: { code: number; message: string };
}

export interface JsonRpcSuccess {
  jsonrpc: '2.0';
  id: string | number;
  result: { message: AgentMessage };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * First text part, or ''. Accepts both `type` and `kind` tagging; other entries are skipped.
 */
export function firstTextPart(parts: readonly unknown[]): string {
  for (const entry of parts) {
    const part = PartSchema.safeParse(entry);
    if (
      part.success &&
      (part.data.type === 'text' || part.data.kind === 'text') &&
      typeof part.data.text === 'string'
    ) {
      return part.data.text;
    }
  }
  return '';
}

/**
 * Text of `params.message.parts`, or '' when any level is missing
 */
export function paramsText(params: unknown): string {
  const message = isRecord(params) ? params.message : undefined;
  const parts = isRecord(message) && Array.isArray(message.parts) ? message.parts : [];
  return firstTextPart(parts);
}

export function agentMessage(text: string): AgentMessage {
  return {
    role: 'agent',
    messageId: uuidv4(),
    parts: [{ type: 'text', text }]
  };
}

export function rpcError(id: JsonRpcId, code: number, message: string): JsonRpcError {
  return { jsonrpc: '2.0', id, error: { code, message } };
}

/**
 * Best-effort id of a request that failed validation
 */
export function idOf(body: unknown): JsonRpcId {
  if (typeof body !== 'object' || body === null) {
    return null;
  }
  const id: unknown = Reflect.get(body, 'id');
  return typeof id === 'string' || typeof id === 'number' ? id : null;
}

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
