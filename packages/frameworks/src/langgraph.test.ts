/**
 * Tests for LangGraphFramework
 */

import { describe, it, expect, vi } from 'vitest';
import type { Provider } from '@switchboard/sdk';
import { LangGraphFramework, compileProviderGraph, getFramework } from './langgraph';
import type { GraphRunner } from './langgraph';

function echo(): Provider & { calls: string[] } {
  const calls: string[] = [];
  return {
    id: 'echo',
    name: 'Echo',
    ready: true,
    reason: '',
    supportsMessages: true,
    calls,
    generate: (prompt) => {
      calls.push(prompt);
      return prompt ? `Hello, you said: ${prompt}` : 'Hello, World!';
    }
  };
}

describe('LangGraphFramework', () => {
  it('runs the request through a compiled graph', async () => {
    const provider = echo();
    const framework = await getFramework(provider);

    expect(framework).toMatchObject({ id: 'langgraph', ready: true, reason: '' });
    await expect(
      framework.execute([
        { role: 'assistant', content: 'earlier' },
        { role: 'user', content: 'ping' }
      ])
    ).resolves.toBe('Hello, you said: ping');
    expect(provider.calls).toEqual(['ping']);
  });

  it('hands the graph the prompt and the whole history', async () => {
    const invoke = vi.fn(async () => 'from graph');
    const framework = await LangGraphFramework.create(echo(), async () => ({ invoke }));
    const messages = [{ role: 'user', content: ' hi ' }];

    await expect(framework.execute(messages)).resolves.toBe('from graph');
    expect(invoke).toHaveBeenCalledWith({ prompt: 'hi', messages });
  });

  it('stays ready and answers directly when the graph cannot be built', async () => {
    const framework = await LangGraphFramework.create(echo(), async () => {
      throw new Error("Cannot find package '@langchain/langgraph'");
    });

    expect(framework.ready).toBe(true);
    expect(framework.usesGraph).toBe(false);
    expect(framework.reason).toBe(
      "LangGraph unavailable, fallback active: Cannot find package '@langchain/langgraph'"
    );
    await expect(framework.execute([{ role: 'user', content: 'ping' }])).resolves.toBe(
      'Hello, you said: ping'
    );
  });

  it('reports a failed run as a langgraph error string', async () => {
    const failing: GraphRunner = {
      invoke: async () => {
        throw new Error('Recursion limit of 25 reached');
      }
    };
    const framework = await LangGraphFramework.create(echo(), async () => failing);
    await expect(framework.execute([{ role: 'user', content: 'ping' }])).resolves.toBe(
      '[langgraph error] Recursion limit of 25 reached'
    );
  });

  it('compiles a graph that degrades a failing provider like the shim does', async () => {
    const provider: Provider = {
      ...echo(),
      generate: () => {
        throw new Error('backend down');
      }
    };
    const graph = await compileProviderGraph(provider);
    await expect(graph.invoke({ prompt: 'ping', messages: [] })).resolves.toBe(
      '[framework/provider error] backend down'
    );
  });
});
