/**
 * Tests for ProviderRegistry
 */

import { describe, it, expect, vi } from 'vitest';
import { fileURLToPath } from 'node:url';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ProviderRegistry } from './provider-registry';
import { PROVIDER_ALIASES } from './aliases';
import { importLoader } from '../plugins/manifest';
import type { BuiltinTable } from '../plugins/slot';
import type { Provider } from '../interfaces/provider';

const fixturePath = (name: string): string =>
  fileURLToPath(new URL(`../../test-fixtures/${name}`, import.meta.url));

function fakeProvider(id: string): Provider {
  return {
    id,
    name: id,
    ready: true,
    reason: '',
    supportsMessages: true,
    generate: (prompt) => (prompt.trim() ? `Hello, you said: ${prompt.trim()}` : 'Hello, World!')
  };
}

const builtins: BuiltinTable = {
  echo: async () => ({ getProvider: () => fakeProvider('echo') }),
  openai: async () => ({ getProvider: () => fakeProvider('openai') }),
  azure_openai: async () => ({ getProvider: () => fakeProvider('azure_openai') }),
  broken: importLoader(new URL('../../test-fixtures/broken-import.mjs', import.meta.url).href)
};

describe('ProviderRegistry', () => {
  it('builds every registered id without throwing', async () => {
    const registry = await ProviderRegistry.load({ builtins });
    for (const id of registry.ids()) {
      const provider = await registry.build(id);
      expect(typeof provider.ready).toBe('boolean');
      expect(typeof provider.reason).toBe('string');
      expect(typeof provider.generate).toBe('function');
    }
  });

  it('resolves aliases case-insensitively', async () => {
    const registry = await ProviderRegistry.load({ builtins });
    expect(registry.resolve('  Azure ')).toBe('azure_openai');
    expect(registry.resolve('AZURE-OPENAI')).toBe('azure_openai');
    expect(registry.resolve('claude')).toBe('anthropic');
    expect(registry.resolve('Something')).toBe('something');
    await expect(registry.build('azure')).resolves.toMatchObject({ id: 'azure_openai' });
  });

  it('resolves idempotently for every alias', async () => {
    const registry = await ProviderRegistry.load({ builtins });
    for (const alias of Object.keys(PROVIDER_ALIASES)) {
      const once = registry.resolve(alias);
      expect(registry.resolve(once)).toBe(once);
    }
  });

  it('falls back to echo for unknown selectors', async () => {
    const registry = await ProviderRegistry.load({ builtins });
    await expect(registry.build('does-not-exist')).resolves.toMatchObject({ id: 'echo' });
  });

  it('falls back to the first registered provider without echo', async () => {
    const registry = await ProviderRegistry.load({
      builtins: { openai: async () => ({ getProvider: () => fakeProvider('openai') }) }
    });
    await expect(registry.build('watsonx')).resolves.toMatchObject({ id: 'openai' });
  });

  it('produces the unknown placeholder when nothing is registered', async () => {
    const registry = await ProviderRegistry.load({});
    const provider = await registry.build('anything');
    expect(provider).toMatchObject({
      id: 'unknown',
      ready: false,
      reason: 'No providers discovered'
    });
    await expect(Promise.resolve(provider.generate('', []))).resolves.toBe(
      '[unknown not ready: No providers discovered] Hello, World!'
    );
  });

  it('uses the configured selector when none is given', async () => {
    const registry = await ProviderRegistry.load({ builtins, selected: 'Azure' });
    expect(registry.selected).toBe('azure_openai');
    await expect(registry.build()).resolves.toMatchObject({ id: 'azure_openai' });
    await expect(registry.build('  ')).resolves.toMatchObject({ id: 'azure_openai' });
  });

  it('reads LLM_PROVIDER when no selector is configured', async () => {
    vi.stubEnv('LLM_PROVIDER', 'OpenAI');
    try {
      const registry = await ProviderRegistry.load({ builtins });
      await expect(registry.build()).resolves.toMatchObject({ id: 'openai' });
    } finally {
      vi.unstubAllEnvs();
    }
  });

  it('returns a placeholder for a plugin whose import fails', async () => {
    const registry = await ProviderRegistry.load({ builtins });
    await expect(registry.build('broken')).resolves.toMatchObject({
      id: 'broken',
      ready: false,
      reason: 'Import error: boom at import'
    });
  });

  describe('provider()', () => {
    it('shares one build between concurrent first callers', async () => {
      const factory = vi.fn(async () => {
        await new Promise((resolve) => setTimeout(resolve, 5));
        return fakeProvider('echo');
      });
      const registry = await ProviderRegistry.load({
        builtins: { echo: async () => ({ getProvider: factory }) }
      });

      const [a, b, c] = await Promise.all([
        registry.provider(),
        registry.provider(),
        registry.provider()
      ]);
      expect(a).toBe(b);
      expect(b).toBe(c);
      await expect(registry.provider()).resolves.toBe(a);
      expect(factory).toHaveBeenCalledTimes(1);
    });

    it('bypasses the cache for fresh or explicit requests', async () => {
      const factory = vi.fn(async () => fakeProvider('echo'));
      const registry = await ProviderRegistry.load({
        builtins: { echo: async () => ({ getProvider: factory }) }
      });

      const cached = await registry.provider();
      const fresh = await registry.provider({ fresh: true });
      const explicit = await registry.provider({ selector: 'echo' });

      expect(fresh).not.toBe(cached);
      expect(explicit).not.toBe(cached);
      await expect(registry.provider()).resolves.toBe(cached);
      expect(factory).toHaveBeenCalledTimes(3);
    });
  });

  describe('list()', () => {
    it('keeps listing the other plugins when one is broken', async () => {
      const registry = await ProviderRegistry.load({ builtins });
      await expect(registry.list()).resolves.toEqual({
        echo: 'builtin',
        openai: 'builtin',
        azure_openai: 'builtin',
        broken: 'builtin'
      });
    });

    it('re-reads the manifest on every call', async () => {
      const dir = await mkdtemp(join(tmpdir(), 'switchboard-registry-'));
      const manifestPath = join(dir, 'switchboard.plugins.json');
      try {
        const registry = await ProviderRegistry.load({ builtins, manifestPath });
        expect(await registry.list()).not.toHaveProperty('acme');

        await writeFile(
          manifestPath,
          JSON.stringify({
            plugins: [{ slot: 'providers', id: 'acme', module: fixturePath('good-provider.mjs') }]
          }),
          'utf8'
        );
        expect(await registry.list()).toHaveProperty('acme', 'extension');
        // the entry table itself was frozen at load
        expect(registry.has('acme')).toBe(false);
      } finally {
        await rm(dir, { recursive: true, force: true });
      }
    });
  });

  describe('inspect()', () => {
    it('reports readiness for every registered provider', async () => {
      const registry = await ProviderRegistry.load({ builtins });
      const report = await registry.inspect();

      expect(report.map((r) => r.id)).toEqual(['echo', 'openai', 'azure_openai', 'broken']);
      expect(report[0]).toEqual({
        id: 'echo',
        name: 'echo',
        ready: true,
        reason: '',
        source: 'builtin'
      });
      expect(report[3]).toMatchObject({ id: 'broken', ready: false, source: 'builtin' });
    });
  });
});
