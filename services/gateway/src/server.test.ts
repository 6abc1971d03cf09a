import { afterEach, describe, expect, it, vi } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { extractLastUserText } from '@switchboard/sdk';
import type { ChatMessage, Framework, Provider } from '@switchboard/sdk';
import { loadConfig } from './config';
import { JSON_REQUIRED, createServer } from './server';

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

function fakeProvider(overrides: Partial<Provider> = {}): Provider {
  return {
    id: 'echo',
    name: 'Echo',
    ready: true,
    reason: 'Echo provider is always ready.',
    supportsMessages: true,
    generate: (prompt: string) => `Hello, you said: ${prompt}`,
    ...overrides
  };
}

function fakeFramework(provider: Provider, overrides: Partial<Framework> = {}): Framework {
  return {
    id: 'native',
    name: 'Native PassThrough',
    ready: true,
    reason: 'Native framework is ready.',
    provider,
    execute: vi.fn(async (messages: readonly ChatMessage[]) => {
      const text = extractLastUserText(messages);
      return text ? `Hello, you said: ${text}` : 'Hello, World!';
    }),
    ...overrides
  };
}

interface Setup {
  env?: Record<string, string>;
  provider?: Provider;
  framework?: Framework;
}

let app: FastifyInstance | undefined;

async function build(setup: Setup = {}): Promise<{ app: FastifyInstance; framework: Framework }> {
  const provider = setup.provider ?? fakeProvider();
  const framework = setup.framework ?? fakeFramework(provider);
  app = await createServer({ config: loadConfig(setup.env ?? {}), provider, framework, logger: false });
  return { app, framework };
}

function sendMessage(text: string) {
  return {
    method: 'message/send',
    params: {
      message: { role: 'user', messageId: 'm-1', parts: [{ type: 'text', text }] }
    }
  };
}

afterEach(async () => {
  await app?.close();
  app = undefined;
});

describe('gateway server', () => {
  describe('diagnostic headers', () => {
    it('adds a request id and disables caching', async () => {
      const { app } = await build();

      const response = await app.inject({ method: 'GET', url: '/healthz' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ status: 'ok' });
      expect(response.headers['x-request-id']).toMatch(UUID);
      expect(response.headers['cache-control']).toBe('no-store');
    });

    it('echoes the caller request id, also on errors', async () => {
      const { app } = await build();

      const response = await app.inject({
        method: 'GET',
        url: '/missing',
        headers: { 'x-request-id': 'req-123' }
      });

      expect(response.statusCode).toBe(404);
      expect(response.headers['x-request-id']).toBe('req-123');
      expect(response.headers['cache-control']).toBe('no-store');
    });
  });

  describe('discovery', () => {
    it('redirects the root to the agent card', async () => {
      const { app } = await build();

      const response = await app.inject({ method: 'GET', url: '/' });

      expect(response.statusCode).toBe(307);
      expect(response.headers.location).toBe('/.well-known/agent-card.json');
    });

    it('serves the agent card', async () => {
      const { app } = await build({ env: { PUBLIC_URL: 'http://agent.test:8000' } });

      const response = await app.inject({ method: 'GET', url: '/.well-known/agent-card.json' });

      expect(response.statusCode).toBe(200);
      expect(response.json().url).toBe('http://agent.test:8000/rpc');
      expect(response.json().skills[0].id).toBe('say-hello');
    });
  });

  describe('GET /readyz', () => {
    it('reports ready when provider and framework are ready', async () => {
      const { app } = await build();

      const response = await app.inject({ method: 'GET', url: '/readyz' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        status: 'ready',
        provider: { id: 'echo', name: 'Echo', ready: true, reason: 'Echo provider is always ready.' },
        framework: { id: 'native', name: 'Native PassThrough', ready: true, reason: 'Native framework is ready.' }
      });
    });

    it('returns 503 when the provider is not ready', async () => {
      const provider = fakeProvider({ id: 'openai', name: 'OpenAI', ready: false, reason: 'Missing OPENAI_API_KEY' });
      const { app } = await build({ provider });

      const response = await app.inject({ method: 'GET', url: '/readyz' });

      expect(response.statusCode).toBe(503);
      expect(response.json().status).toBe('not-ready');
      expect(response.json().provider.reason).toBe('Missing OPENAI_API_KEY');
    });
  });

  describe('POST /a2a', () => {
    it('runs the framework on the first text part', async () => {
      const { app, framework } = await build();

      const response = await app.inject({ method: 'POST', url: '/a2a', payload: sendMessage('ping') });

      expect(response.statusCode).toBe(200);
      const { message } = response.json();
      expect(message.role).toBe('agent');
      expect(message.messageId).toMatch(UUID);
      expect(message.parts).toEqual([{ type: 'text', text: 'Hello, you said: ping' }]);
      expect(framework.execute).toHaveBeenCalledWith([{ role: 'user', content: 'ping' }]);
    });

    it('accepts parts tagged with kind', async () => {
      const { app } = await build();

      const response = await app.inject({
        method: 'POST',
        url: '/a2a',
        payload: {
          method: 'message/send',
          params: { message: { parts: [{ kind: 'file' }, { kind: 'text', text: 'hi' }] } }
        }
      });

      expect(response.json().message.parts[0].text).toBe('Hello, you said: hi');
    });

    it('greets when message/send carries no params', async () => {
      const { app, framework } = await build();

      const response = await app.inject({ method: 'POST', url: '/a2a', payload: { method: 'message/send' } });

      expect(response.statusCode).toBe(200);
      expect(response.json().message.parts).toEqual([{ type: 'text', text: 'Hello, World!' }]);
      expect(framework.execute).toHaveBeenCalledWith([{ role: 'user', content: '' }]);
    });

    it('greets when the message has no parts', async () => {
      const { app } = await build();

      const response = await app.inject({
        method: 'POST',
        url: '/a2a',
        payload: { method: 'message/send', params: { message: { role: 'user' } } }
      });

      expect(response.statusCode).toBe(200);
      expect(response.json().message.parts[0].text).toBe('Hello, World!');
    });

    it('rejects other methods with 400', async () => {
      const { app } = await build();

      const response = await app.inject({
        method: 'POST',
        url: '/a2a',
        payload: { ...sendMessage('ping'), method: 'tasks/get' }
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        type: 'about:blank',
        title: 'Bad Request',
        status: 400,
        detail: 'Unsupported A2A payload',
        instance: '/a2a'
      });
    });

    it('requires a JSON body', async () => {
      const { app } = await build();

      const response = await app.inject({
        method: 'POST',
        url: '/a2a',
        headers: { 'content-type': 'text/plain' },
        payload: 'ping'
      });

      expect(response.statusCode).toBe(415);
      expect(response.json().detail).toBe(JSON_REQUIRED);
    });

    it('answers malformed JSON with a problem document', async () => {
      const { app } = await build();

      const response = await app.inject({
        method: 'POST',
        url: '/a2a',
        headers: { 'content-type': 'application/json' },
        payload: '{"method":'
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().title).toBe('Bad Request');
    });
  });

  describe('POST /rpc', () => {
    it('wraps the reply in a JSON-RPC result', async () => {
      const { app } = await build();

      const response = await app.inject({
        method: 'POST',
        url: '/rpc',
        payload: { jsonrpc: '2.0', id: 1, ...sendMessage('ping') }
      });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.jsonrpc).toBe('2.0');
      expect(body.id).toBe(1);
      expect(body.result.message.parts).toEqual([{ type: 'text', text: 'Hello, you said: ping' }]);
    });

    it('treats a missing jsonrpc member as 2.0', async () => {
      const { app } = await build();

      const response = await app.inject({
        method: 'POST',
        url: '/rpc',
        payload: { id: 'no-version', ...sendMessage('ping') }
      });

      expect(response.statusCode).toBe(200);
      expect(response.json().jsonrpc).toBe('2.0');
      expect(response.json().id).toBe('no-version');
      expect(response.json().result.message.parts).toEqual([{ type: 'text', text: 'Hello, you said: ping' }]);
    });

    it('reports unknown methods', async () => {
      const { app } = await build();

      const response = await app.inject({
        method: 'POST',
        url: '/rpc',
        payload: { jsonrpc: '2.0', id: 'abc', method: 'tasks/cancel', params: {} }
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        jsonrpc: '2.0',
        id: 'abc',
        error: { code: -32601, message: 'Method not found' }
      });
    });

    it('reports invalid requests with the caller id', async () => {
      const { app } = await build();

      const response = await app.inject({
        method: 'POST',
        url: '/rpc',
        payload: { jsonrpc: '1.0', id: 7, method: 'message/send' }
      });

      expect(response.statusCode).toBe(200);
      expect(response.json().id).toBe(7);
      expect(response.json().error.code).toBe(-32600);
      expect(response.json().error.message).toMatch(/^Invalid Request: jsonrpc/);
    });

    it('reports missing message params as invalid', async () => {
      const { app } = await build();

      const response = await app.inject({
        method: 'POST',
        url: '/rpc',
        payload: { jsonrpc: '2.0', id: 2, method: 'message/send', params: {} }
      });

      expect(response.json().error.code).toBe(-32600);
      expect(response.json().id).toBe(2);
    });

    it('reports parse errors with a null id', async () => {
      const { app } = await build();

      const response = await app.inject({
        method: 'POST',
        url: '/rpc',
        headers: { 'content-type': 'application/json' },
        payload: '{not json'
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        jsonrpc: '2.0',
        id: null,
        error: { code: -32700, message: 'Parse error' }
      });
    });
  });

  describe('POST /openai/v1/chat/completions', () => {
    it('returns a chat.completion with one choice', async () => {
      const { app, framework } = await build();

      const response = await app.inject({
        method: 'POST',
        url: '/openai/v1/chat/completions',
        payload: {
          messages: [
            { role: 'system', content: 'be nice' },
            { role: 'user', content: [{ type: 'text', text: 'hi' }, 'there'] }
          ]
        }
      });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.id).toMatch(/^chatcmpl-/);
      expect(body.object).toBe('chat.completion');
      expect(body.model).toBe('switchboard');
      expect(typeof body.created).toBe('number');
      expect(body.choices).toEqual([
        { index: 0, message: { role: 'assistant', content: 'Hello, you said: hi\nthere' }, finish_reason: 'stop' }
      ]);
      expect(body.usage).toEqual({ prompt_tokens: 0, completion_tokens: 0, total_tokens: 0 });
      expect(framework.execute).toHaveBeenCalledWith([
        { role: 'system', content: 'be nice' },
        { role: 'user', content: 'hi\nthere' }
      ]);
    });

    it('echoes the requested model', async () => {
      const { app } = await build();

      const response = await app.inject({
        method: 'POST',
        url: '/openai/v1/chat/completions',
        payload: { model: 'my-agent', messages: [{ role: 'user', content: 'ping' }] }
      });

      expect(response.json().model).toBe('my-agent');
    });

    it('rejects an empty message list', async () => {
      const { app } = await build();

      const response = await app.inject({
        method: 'POST',
        url: '/openai/v1/chat/completions',
        payload: { messages: [] }
      });

      expect(response.statusCode).toBe(400);
    });

    it('rejects an empty body', async () => {
      const { app } = await build();

      const response = await app.inject({
        method: 'POST',
        url: '/openai/v1/chat/completions',
        headers: { 'content-type': 'application/json' },
        payload: ''
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().detail).toBe('Empty JSON body');
    });
  });

  describe('private adapter', () => {
    const bearer = {
      PRIVATE_ADAPTER_ENABLED: 'true',
      PRIVATE_ADAPTER_AUTH_SCHEME: 'BEARER',
      PRIVATE_ADAPTER_AUTH_TOKEN: 'test-secret'
    };

    it('is not routed when disabled', async () => {
      const { app } = await build();

      const response = await app.inject({ method: 'POST', url: '/enterprise/v1/agent', payload: { input: 'hi' } });

      expect(response.statusCode).toBe(404);
    });

    it('refuses requests without credentials', async () => {
      const { app, framework } = await build({ env: bearer });

      const response = await app.inject({ method: 'POST', url: '/enterprise/v1/agent', payload: { input: 'hi' } });

      expect(response.statusCode).toBe(401);
      expect(response.json().title).toBe('Unauthorized');
      expect(framework.execute).not.toHaveBeenCalled();
    });

    it('answers in the flat envelope and echoes the trace id', async () => {
      const { app } = await build({ env: bearer });

      const response = await app.inject({
        method: 'POST',
        url: '/enterprise/v1/agent',
        headers: { authorization: 'Bearer test-secret' },
        payload: { input: 'hello', traceId: 't-1' }
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ output: 'Hello, you said: hello', ok: true, traceId: 't-1' });
    });

    it('uses custom keys and falls back to the message list', async () => {
      const { app } = await build({
        env: {
          PRIVATE_ADAPTER_ENABLED: 'true',
          PRIVATE_ADAPTER_AUTH_SCHEME: 'API_KEY',
          PRIVATE_ADAPTER_AUTH_TOKEN: 'test-secret',
          PRIVATE_ADAPTER_INPUT_KEY: 'query',
          PRIVATE_ADAPTER_OUTPUT_KEY: 'answer',
          PRIVATE_ADAPTER_PATH: '/internal/agent'
        }
      });

      const response = await app.inject({
        method: 'POST',
        url: '/internal/agent',
        headers: { 'x-api-key': 'test-secret' },
        payload: { messages: [{ role: 'user', content: 'from messages' }] }
      });

      expect(response.json()).toEqual({ answer: 'Hello, you said: from messages', ok: true });
    });
  });

  describe('errors', () => {
    it('renders unknown routes as problem details', async () => {
      const { app } = await build();

      const response = await app.inject({ method: 'GET', url: '/nope?x=1' });

      expect(response.json()).toEqual({
        type: 'about:blank',
        title: 'Not Found',
        status: 404,
        detail: 'Route GET /nope not found',
        instance: '/nope?x=1'
      });
    });

    it('hides internal failures', async () => {
      const provider = fakeProvider();
      const framework = fakeFramework(provider, {
        execute: async () => {
          throw new Error('database password is hunter2');
        }
      });
      const { app } = await build({ provider, framework });

      const response = await app.inject({ method: 'POST', url: '/a2a', payload: sendMessage('ping') });

      expect(response.statusCode).toBe(500);
      expect(response.json().title).toBe('Internal Server Error');
      expect(response.json().detail).toBe('internal_error');
    });
  });
});
