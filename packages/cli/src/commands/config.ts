import { createInterface } from 'node:readline';
import { InvalidArgumentError, type Command } from 'commander';
import { JsonConfigStore, type ConfigUpdate, type EngineConfig } from '@threadmerge/core';
import { createConfigService } from '../index.js';
import { getConfigDir, getDefaultDbPath, getDefaultRunsDir } from '../adapters/xdg-paths.js';
import { fail, parseInteger } from './options.js';

function prompt(question: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stderr });
  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
}

export const CONFIG_KEYS = [
  'api-key',
  'runlog-url',
  'timeout',
  'retries',
  'retry-delay',
  'cache-ttl',
  'db-path',
  'stale-policy',
  'containment',
  'page-size',
  'max-page-size',
] as const;

export type ConfigKey = (typeof CONFIG_KEYS)[number];

export function isConfigKey(value: string): value is ConfigKey {
  return CONFIG_KEYS.some((key) => key === value);
}

/** Map a `config set <key> <value>` pair onto the preferences it changes. */
export function toConfigUpdate(key: ConfigKey, value: string): ConfigUpdate {
  switch (key) {
    case 'api-key':
      return { apiKey: value };
    case 'runlog-url':
      return { runLogUrl: value };
    case 'timeout':
      return { runLogTimeoutMs: parseInteger(value) };
    case 'retries':
      return { runLogMaxRetries: parseInteger(value) };
    case 'retry-delay':
      return { runLogRetryDelayMs: parseInteger(value) };
    case 'cache-ttl':
      return { runLogCacheTtlMs: parseInteger(value) };
    case 'db-path':
      return { dbPath: value };
    case 'stale-policy':
      if (value !== 'retain' && value !== 'drop') {
        throw new InvalidArgumentError('stale-policy must be "retain" or "drop".');
      }
      return { staleLocalPolicy: value };
    case 'containment':
      if (value !== 'session' && value !== 'run') {
        throw new InvalidArgumentError('containment must be "session" or "run".');
      }
      return { containmentScope: value };
    case 'page-size':
      return { defaultPageSize: parseInteger(value) };
    case 'max-page-size':
      return { maxPageSize: parseInteger(value) };
  }
}

export function maskApiKey(key: string): string {
  return key ? '***' + key.slice(-4) : '(not set)';
}

function describeConfig(resolved: EngineConfig) {
  return {
    runLogUrl: resolved.runLogUrl ?? `(none, snapshots in ${getDefaultRunsDir()})`,
    runLogApiKey: maskApiKey(resolved.runLogApiKey),
    runLogTimeoutMs: resolved.runLogTimeoutMs,
    runLogMaxRetries: resolved.runLogMaxRetries,
    runLogRetryDelayMs: resolved.runLogRetryDelayMs,
    runLogCacheTtlMs: resolved.runLogCacheTtlMs,
    dbPath: resolved.dbPath ?? getDefaultDbPath(),
    staleLocalPolicy: resolved.staleLocalPolicy,
    containmentScope: resolved.containmentScope,
    defaultPageSize: resolved.defaultPageSize,
    maxPageSize: resolved.maxPageSize,
    configDir: getConfigDir(),
  };
}

export function registerConfigCommand(program: Command): void {
  const config = program.command('config').description('Manage configuration');

  config
    .command('show')
    .description('Show current configuration')
    .option('--json', 'Output as JSON')
    .action(async (opts: { json?: boolean }) => {
      let display: ReturnType<typeof describeConfig>;
      try {
        display = describeConfig(await createConfigService().resolve());
      } catch (err) {
        fail(err, opts.json);
      }

      if (opts.json) {
        console.log(JSON.stringify(display, null, 2));
      } else {
        console.log(`\n  Configuration:`);
        console.log(`  Run-log URL:    ${display.runLogUrl}`);
        console.log(`  API Key:        ${display.runLogApiKey}`);
        console.log(`  Timeout:        ${display.runLogTimeoutMs} ms`);
        console.log(`  Retries:        ${display.runLogMaxRetries} (delay ${display.runLogRetryDelayMs} ms)`);
        console.log(`  Cache TTL:      ${display.runLogCacheTtlMs} ms`);
        console.log(`  Ledger DB:      ${display.dbPath}`);
        console.log(`  Stale policy:   ${display.staleLocalPolicy}`);
        console.log(`  Containment:    ${display.containmentScope}`);
        console.log(`  Page size:      ${display.defaultPageSize} (max ${display.maxPageSize})`);
        console.log(`  Config Dir:     ${display.configDir}`);
        console.log();
      }
    });

  config
    .command('set')
    .description('Set a configuration value')
    .argument('<key>', `Configuration key (${CONFIG_KEYS.join(', ')})`)
    .argument('[value]', 'Value to set')
    .action(async (key: string, value?: string) => {
      if (!isConfigKey(key)) {
        fail(`Unknown config key: ${key}. Valid keys: ${CONFIG_KEYS.join(', ')}`);
      }

      const input = value ?? (key === 'api-key' ? await prompt('Run-log API key: ') : '');
      if (!input) {
        fail(`Usage: threadmerge config set ${key} <value>`);
      }

      try {
        await createConfigService().save(toConfigUpdate(key, input));
      } catch (err) {
        fail(err);
      }
      console.log(key === 'api-key' ? 'API key saved.' : `${key} set to: ${input}`);
    });

  config
    .command('reset')
    .description('Reset configuration to defaults')
    .action(async () => {
      await createConfigService().reset();
      console.log('Configuration reset to defaults.');
    });

  config
    .command('path')
    .description('Print the preferences file location')
    .action(() => {
      console.log(new JsonConfigStore(getConfigDir()).prefsPath);
    });

  // Default: show config when no subcommand
  config.action(async () => {
    await config.commands.find((c) => c.name() === 'show')?.parseAsync([], { from: 'user' });
  });
}
