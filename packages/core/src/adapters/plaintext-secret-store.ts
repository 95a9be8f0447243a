import type { SecretStore } from '../ports/secret-store.js';

/**
 * Base64 encoding for the run-log API key in the preferences file.
 * NOT encryption; keeps the key out of casual view only.
 */
export class PlaintextSecretStore implements SecretStore {
  encode(value: string): string {
    return Buffer.from(value, 'utf-8').toString('base64');
  }

  decode(stored: string): string {
    return Buffer.from(stored, 'base64').toString('utf-8');
  }
}
