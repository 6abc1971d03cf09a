/**
 * Agent Card
 * Discovery document served at /.well-known/agent-card.json
 */

import type { GatewayConfig } from './config';

export const AGENT_CARD_PATH = '/.well-known/agent-card.json';

export interface AgentSkill {
  id: string;
  name: string;
  description: string;
  tags: string[];
}

export interface AgentCard {
  protocolVersion: string;
  name: string;
  description: string;
  version: string;
  preferredTransport: 'JSONRPC';
  url: string;
  capabilities: { streaming: boolean; pushNotifications: boolean };
  defaultInputModes: string[];
  defaultOutputModes: string[];
  skills: AgentSkill[];
}

export function agentCard(config: Pick<GatewayConfig, 'agent' | 'publicUrl'>): AgentCard {
  return {
    protocolVersion: config.agent.protocolVersion,
    name: config.agent.name,
    description: config.agent.description,
    version: config.agent.version,
    preferredTransport: 'JSONRPC',
    url: `${config.publicUrl}/rpc`,
    capabilities: { streaming: false, pushNotifications: false },
    defaultInputModes: ['text/plain'],
    defaultOutputModes: ['text/plain'],
    skills: [
      {
        id: 'say-hello',
        name: 'Say Hello',
        description: 'Responds with a friendly greeting.',
        tags: ['hello', 'greeting']
      }
    ]
  };
}
