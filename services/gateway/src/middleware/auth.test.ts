import { describe, expect, it } from 'vitest';
import { isAuthorized } from './auth';

describe('isAuthorized', () => {
  it('lets everything through without a scheme', () => {
    expect(isAuthorized({ authScheme: 'NONE', authToken: '' }, {})).toBe(true);
  });

  it('checks bearer tokens', () => {
    const config = { authScheme: 'BEARER' as const, authToken: 'test-secret' };

    expect(isAuthorized(config, { authorization: 'Bearer test-secret' })).toBe(true);
    expect(isAuthorized(config, { authorization: 'Bearer wrong' })).toBe(false);
    expect(isAuthorized(config, { authorization: 'test-secret' })).toBe(false);
    expect(isAuthorized(config, {})).toBe(false);
  });

  it('checks the X-API-Key header', () => {
    const config = { authScheme: 'API_KEY' as const, authToken: 'test-secret' };

    expect(isAuthorized(config, { 'x-api-key': 'test-secret' })).toBe(true);
    expect(isAuthorized(config, { 'x-api-key': 'nope' })).toBe(false);
  });

  it('refuses everyone when no token is configured', () => {
    expect(isAuthorized({ authScheme: 'BEARER', authToken: '' }, { authorization: 'Bearer ' })).toBe(false);
    expect(isAuthorized({ authScheme: 'API_KEY', authToken: '' }, { 'x-api-key': '' })).toBe(false);
  });
});
