#!/usr/bin/env tsx

/**
 * Switchboard CLI - talk to a running gateway and inspect the plugin registries
 * Usage: ./scripts/switchboard-cli.ts <command> [options]
 */

import { Command } from 'commander';
import { config } from 'dotenv';
import chalk from 'chalk';
import { isAxiosError } from 'axios';
import { FrameworkRegistry, ProviderRegistry, createLogger } from '@switchboard/sdk';
import type { Logger } from '@switchboard/sdk';
import { BUILTIN_PROVIDERS } from '@switchboard/providers';
import { BUILTIN_FRAMEWORKS } from '@switchboard/frameworks';
import { GatewayClient, agentCard, loadConfig } from '@switchboard/gateway';

// Load environment variables
config();

const program = new Command();

program
  .name('switchboard')
  .description('Switchboard gateway CLI')
  .version('0.1.0')
  .option('--url <url>', 'Gateway base URL', process.env.PUBLIC_URL ?? 'http://localhost:8000');

function baseUrl(): string {
  const { url } = program.opts<{ url: string }>();
  return url;
}

// Discovery warnings only show with LOG_LEVEL=debug
function cliLogger(): Logger {
  return createLogger({ name: 'switchboard-cli', level: process.env.LOG_LEVEL === 'debug' ? 'debug' : 'error' });
}

function fail(action: string, error: unknown): never {
  if (isAxiosError(error)) {
    const status = error.response ? `${error.response.status} ${error.response.statusText}` : error.message;
    console.error(chalk.red(`✗ ${action}: ${status}`));
  } else {
    console.error(chalk.red(`✗ ${action}: ${error instanceof Error ? error.message : String(error)}`));
  }
  process.exit(1);
}

program
  .command('ping [text]')
  .description('Send a message to the gateway and print the reply')
  .option('--jsonrpc', 'Use the JSON-RPC endpoint instead of /a2a', false)
  .action(async (text: string | undefined, options: { jsonrpc: boolean }) => {
    try {
      const client = new GatewayClient(baseUrl());
      console.log(await client.send(text ?? 'Hello from CLI', { jsonrpc: options.jsonrpc }));
    } catch (error) {
      fail('Ping failed', error);
    }
  });

program
  .command('card')
  .description('Print the agent card')
  .option('--remote', 'Fetch the card from the running gateway', false)
  .action(async (options: { remote: boolean }) => {
    try {
      const card = options.remote ? await new GatewayClient(baseUrl()).card() : agentCard(loadConfig());
      console.log(JSON.stringify(card, null, 2));
    } catch (error) {
      fail('Could not load the agent card', error);
    }
  });

program
  .command('providers')
  .description('List discovered providers')
  .option('--check', 'Construct every provider and report readiness', false)
  .action(async (options: { check: boolean }) => {
    try {
      const settings = loadConfig();
      const registry = await ProviderRegistry.load({
        builtins: BUILTIN_PROVIDERS,
        manifestPath: settings.pluginManifest,
        selected: settings.llmProvider,
        logger: cliLogger()
      });

      console.log(chalk.green(`Selected provider: ${registry.selected}`));
      if (!options.check) {
        for (const [id, source] of Object.entries(await registry.list())) {
          console.log(`  ${chalk.cyan(id)} ${chalk.gray(`(${source})`)}`);
        }
        return;
      }

      for (const report of await registry.inspect()) {
        const status = report.ready ? chalk.green('✓') : chalk.red('✗');
        console.log(`  ${status} ${chalk.cyan(report.id)} - ${report.name} ${chalk.gray(`(${report.source})`)}`);
        console.log(`    ${chalk.gray(report.reason)}`);
      }
    } catch (error) {
      fail('Could not list providers', error);
    }
  });

program
  .command('frameworks')
  .description('List discovered frameworks')
  .action(async () => {
    try {
      const settings = loadConfig();
      const registry = await FrameworkRegistry.load({
        builtins: BUILTIN_FRAMEWORKS,
        manifestPath: settings.pluginManifest,
        selected: settings.agentFramework,
        logger: cliLogger()
      });

      console.log(chalk.green(`Selected framework: ${registry.selected}`));
      for (const [id, source] of Object.entries(await registry.list())) {
        console.log(`  ${chalk.cyan(id)} ${chalk.gray(`(${source})`)}`);
      }
    } catch (error) {
      fail('Could not list frameworks', error);
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => fail('Command failed', error));
