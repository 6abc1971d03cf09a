/**
 * LangGraph Framework
 * Runs each request through a one-node LangGraph state graph whose only node
 * is the provider. Without a usable graph it answers directly instead.
 */

import {
  BaseFramework,
  ErrorFactory,
  callProvider,
  extractLastUserText,
  formatFrameworkError
} from '@switchboard/sdk';
import type { ChatMessage, FrameworkFactory, Provider } from '@switchboard/sdk';

export interface GraphInput {
  prompt: string;
  messages: readonly ChatMessage[];
}

/**
 * The compiled graph, reduced to what the framework calls
 */
export interface GraphRunner {
  invoke(input: GraphInput): Promise<string>;
}

export type GraphBuilder = (provider: Provider) => Promise<GraphRunner>;

/**
 * START -> agent -> END, where `agent` calls the provider through the shim
 */
export async function compileProviderGraph(provider: Provider): Promise<GraphRunner> {
  const { Annotation, StateGraph, START, END } = await import('@langchain/langgraph');

  const AgentState = Annotation.Root({
    prompt: Annotation<string>,
    messages: Annotation<readonly ChatMessage[]>,
    reply: Annotation<string>
  });

  const app = new StateGraph(AgentState)
    .addNode('agent', async (state) => ({
      reply: await callProvider(provider, state.prompt, state.messages)
    }))
    .addEdge(START, 'agent')
    .addEdge('agent', END)
    .compile();

  return {
    async invoke(input: GraphInput): Promise<string> {
      const state = await app.invoke({
        prompt: input.prompt,
        messages: input.messages,
        reply: ''
      });
      return state.reply;
    }
  };
}

export class LangGraphFramework extends BaseFramework {
  readonly id = 'langgraph';
  readonly name = 'LangGraph Framework';
  // usable either way: the fallback path answers directly
  readonly ready = true;
  readonly reason: string;

  private constructor(
    provider: Provider,
    private readonly graph: GraphRunner | undefined,
    unavailable?: string
  ) {
    super(provider);
    this.reason = unavailable === undefined ? '' : `LangGraph unavailable, fallback active: ${unavailable}`;
  }

  /**
   * Compile the graph for `provider`; a failure selects the direct path
   */
  static async create(
    provider: Provider,
    build: GraphBuilder = compileProviderGraph
  ): Promise<LangGraphFramework> {
    try {
      return new LangGraphFramework(provider, await build(provider));
    } catch (error) {
      return new LangGraphFramework(provider, undefined, ErrorFactory.messageOf(error));
    }
  }

  get usesGraph(): boolean {
    return this.graph !== undefined;
  }

  async execute(messages: readonly ChatMessage[]): Promise<string> {
    if (!this.graph) {
      return this.direct(messages);
    }
    try {
      return await this.graph.invoke({ prompt: extractLastUserText(messages), messages });
    } catch (error) {
      return formatFrameworkError(this.id, error);
    }
  }
}

export const getFramework: FrameworkFactory = (provider) => LangGraphFramework.create(provider);
