/** Reversible encoding for secrets kept in the preferences file. */
export interface SecretStore {
  encode(value: string): string;
  decode(stored: string): string;
}
