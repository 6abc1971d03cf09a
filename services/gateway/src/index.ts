/**
 * Switchboard Gateway
 */

export * from './config';
export * from './card';
export * from './a2a';
export * from './problem';
export * from './server';
export * from './registries';
export * from './client';
export type { GatewayContext } from './context';
export { isAuthorized } from './middleware/auth';
export { contentToText } from './routes/openai';
export { extractUserText } from './routes/private-adapter';
