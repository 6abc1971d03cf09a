/**
 * A2A routes
 * Plain `message/send` on /a2a and its JSON-RPC 2.0 binding on /rpc
 */

import type { FastifyInstance } from 'fastify';
import {
  A2ARequestSchema,
  JSONRPC_INVALID_REQUEST,
  JSONRPC_METHOD_NOT_FOUND,
  JsonRpcEnvelopeSchema,
  MessageSendParamsSchema,
  agentMessage,
  describeIssues,
  firstTextPart,
  idOf,
  paramsText,
  rpcError
} from '../a2a';
import type { JsonRpcSuccess } from '../a2a';
import type { GatewayContext } from '../context';
import { sendProblem } from '../problem';

export function registerA2ARoutes(app: FastifyInstance, context: GatewayContext): void {
  const { framework } = context;

  app.post('/a2a', async (request, reply) => {
    const parsed = A2ARequestSchema.safeParse(request.body);
    if (!parsed.success) {
      return sendProblem(request, reply, 400, 'Unsupported A2A payload');
    }

    const text = paramsText(parsed.data.params);
    const output = await framework.execute([{ role: 'user', content: text }]);
    return { message: agentMessage(output) };
  });

  app.post('/rpc', async (request) => {
    const envelope = JsonRpcEnvelopeSchema.safeParse(request.body);
    if (!envelope.success) {
      return rpcError(
        idOf(request.body),
        JSONRPC_INVALID_REQUEST,
        `Invalid Request: ${describeIssues(envelope.error)}`
      );
    }

    const { id, method, params: rawParams } = envelope.data;
    if (method !== 'message/send') {
      return rpcError(id, JSONRPC_METHOD_NOT_FOUND, 'Method not found');
    }

    const params = MessageSendParamsSchema.safeParse(rawParams);
    if (!params.success) {
      return rpcError(id, JSONRPC_INVALID_REQUEST, `Invalid Request: ${describeIssues(params.error)}`);
    }

    const text = firstTextPart(params.data.message.parts);
    const output = await framework.execute([{ role: 'user', content: text }]);
    const response: JsonRpcSuccess = { jsonrpc: '2.0', id, result: { message: agentMessage(output) } };
    return response;
  });
}
