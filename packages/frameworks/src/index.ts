/**
 * Switchboard Frameworks
 * Built-in framework plugins and their module table
 */

import type { BuiltinTable } from '@switchboard/sdk';

/**
 * Builtin framework modules, imported on first use. Each exports getFramework().
 */
export const BUILTIN_FRAMEWORKS: BuiltinTable = {
  native: () => import('./native'),
  langgraph: () => import('./langgraph'),
  beeai: () => import('./beeai'),
  crewai: () => import('./crewai')
};

export type { GraphBuilder, GraphInput, GraphRunner } from './langgraph';
