/**
 * Tests for AzureOpenAIProvider
 */

import { describe, it, expect } from 'vitest';
import { AzureOpenAIProvider } from './azure-openai';
import { stubHttp } from './testing/stub-http';

const env = {
  AZURE_OPENAI_API_KEY: 'test-secret',
  AZURE_OPENAI_ENDPOINT: 'https://example-resource.openai.azure.com/',
  AZURE_OPENAI_DEPLOYMENT: 'chat'
};

describe('AzureOpenAIProvider', () => {
  it('needs key, endpoint and deployment', () => {
    const provider = new AzureOpenAIProvider({
      env: { AZURE_OPENAI_API_KEY: 'test-secret' }
    });
    expect(provider.ready).toBe(false);
    expect(provider.reason).toBe('Missing AZURE_OPENAI_API_KEY/ENDPOINT/DEPLOYMENT');
  });

  it('calls the deployment with the api-key header', async () => {
    const stub = stubHttp(() => ({ data: { choices: [{ message: { content: 'from azure' } }] } }));
    const provider = new AzureOpenAIProvider({ env, http: stub.http });

    expect(provider.reason).toBe('Azure OpenAI ready (deployment=chat)');
    await expect(provider.generate('hi', [])).resolves.toBe('from azure');

    const [request] = stub.requests;
    expect(request.url).toBe(
      'https://example-resource.openai.azure.com/openai/deployments/chat/chat/completions'
    );
    expect(request.params).toEqual({ 'api-version': '2024-08-01-preview' });
    expect(request.headers['api-key']).toBe('test-secret');
    expect(request.body).toEqual({
      messages: [{ role: 'user', content: 'hi' }],
      temperature: 0.2
    });
  });
});
