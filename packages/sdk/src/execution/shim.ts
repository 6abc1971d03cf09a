/**
 * Execution Shim
 * The single dispatch point between frameworks and providers
 */

import { SpanStatusCode, trace } from '@opentelemetry/api';
import type { Span } from '@opentelemetry/api';
import type { Provider } from '../interfaces/provider';
import type { ChatMessage } from '../types/messages';
import { ErrorFactory } from '../types/errors';

export const PROVIDER_ERROR_TAG = '[framework/provider error]';

/**
 * Structured result of one generation. `text` is always the exact string the
 * plain contract returns; `degraded` adds the reason for callers who care.
 */
export type GenerationOutcome =
  | { status: 'ok'; text: string }
  | { status: 'degraded'; text: string; reason: string };

const tracer = trace.getTracer('switchboard');

/**
 * Invoke `provider.generate` exactly once and settle it into an outcome.
 *
 * `generate` may hand back a string or a promise; awaiting the single return
 * value covers both, so nothing here inspects the calling convention.
 */
export async function callProviderDetailed(
  provider: Provider,
  prompt: string,
  messages: readonly ChatMessage[]
): Promise<GenerationOutcome> {
  return tracer.startActiveSpan(
    'provider.generate',
    {
      attributes: {
        'switchboard.provider.id': provider.id,
        'switchboard.prompt.length': prompt.length,
        'switchboard.messages.count': messages.length
      }
    },
    async (span: Span): Promise<GenerationOutcome> => {
      try {
        if (typeof Reflect.get(provider, 'generate') !== 'function') {
          const reason = "provider has no callable 'generate'";
          span.setStatus({ code: SpanStatusCode.ERROR, message: reason });
          return degraded(reason);
        }

        const text: unknown = await provider.generate(prompt, messages);
        if (typeof text !== 'string') {
          const reason = `generate returned ${typeof text}`;
          span.setStatus({ code: SpanStatusCode.ERROR, message: reason });
          return degraded(reason);
        }
        return { status: 'ok', text };
      } catch (error) {
        const reason = ErrorFactory.messageOf(error);
        span.recordException(error instanceof Error ? error : reason);
        span.setStatus({ code: SpanStatusCode.ERROR, message: reason });
        return degraded(reason);
      } finally {
        span.end();
      }
    }
  );
}

/**
 * Plain-string contract: the reply, or `[framework/provider error] <details>`
 */
export async function callProvider(
  provider: Provider,
  prompt: string,
  messages: readonly ChatMessage[]
): Promise<string> {
  const outcome = await callProviderDetailed(provider, prompt, messages);
  return outcome.text;
}

/**
 * Payload-level error signal for a failed orchestration run
 */
export function formatFrameworkError(frameworkId: string, error: unknown): string {
  return `[${frameworkId} error] ${ErrorFactory.messageOf(error)}`;
}

function degraded(reason: string): GenerationOutcome {
  return { status: 'degraded', text: `${PROVIDER_ERROR_TAG} ${reason}`, reason };
}
