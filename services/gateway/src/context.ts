/**
 * Gateway Context
 * What every route needs, built once at startup
 */

import type { Framework, Provider } from '@switchboard/sdk';
import type { GatewayConfig } from './config';

export interface GatewayContext {
  config: GatewayConfig;
  provider: Provider;
  framework: Framework;
}
