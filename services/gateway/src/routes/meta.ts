/**
 * Discovery and health routes
 */

import type { FastifyInstance } from 'fastify';
import type { Framework, Provider } from '@switchboard/sdk';
import { AGENT_CARD_PATH, agentCard } from '../card';
import type { GatewayContext } from '../context';

interface ComponentStatus {
  id: string;
  name: string;
  ready: boolean;
  reason: string;
}

function status(component: Provider | Framework): ComponentStatus {
  return {
    id: component.id,
    name: component.name,
    ready: component.ready,
    reason: component.reason
  };
}

export function registerMetaRoutes(app: FastifyInstance, context: GatewayContext): void {
  const card = agentCard(context.config);

  app.get('/', async (_request, reply) => reply.code(307).redirect(AGENT_CARD_PATH));

  app.get('/healthz', async () => ({ status: 'ok' }));

  app.get('/readyz', async (_request, reply) => {
    const provider = status(context.provider);
    const framework = status(context.framework);
    const ready = provider.ready && framework.ready;
    return reply.status(ready ? 200 : 503).send({
      status: ready ? 'ready' : 'not-ready',
      provider,
      framework
    });
  });

  app.get(AGENT_CARD_PATH, async () => card);
}
