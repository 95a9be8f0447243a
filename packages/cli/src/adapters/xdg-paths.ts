import { join } from 'node:path';
import { homedir } from 'node:os';

const APP_DIR = 'threadmerge';

export function getConfigDir(): string {
  return process.env.XDG_CONFIG_HOME
    ? join(process.env.XDG_CONFIG_HOME, APP_DIR)
    : join(homedir(), '.config', APP_DIR);
}

export function getDataDir(): string {
  return process.env.XDG_DATA_HOME
    ? join(process.env.XDG_DATA_HOME, APP_DIR)
    : join(homedir(), '.local', 'share', APP_DIR);
}

/** Default ledger database, used when neither the environment nor preferences name one. */
export function getDefaultDbPath(): string {
  return join(getDataDir(), 'ledger.db');
}

/** Where run-log snapshots are looked for when no run-log URL is configured. */
export function getDefaultRunsDir(): string {
  return join(getDataDir(), 'runs');
}
