import { Fernet } from './fernet';
import { CryptoError, SettingsError } from '../errors';
import type { ExecutionOverrides } from '../types';

const OVERRIDE_KEYS = ['memory_limit', 'compile_timeout', 'run_timeout'] as const;

/**
 * Picks the recognized numeric overrides out of a decrypted settings object.
 * Non-numeric values and unknown keys are ignored; fractions are truncated.
 */
export function extractOverrides(settings: Record<string, unknown>): ExecutionOverrides {
  const overrides: ExecutionOverrides = {};
  for (const key of OVERRIDE_KEYS) {
    const value = settings[key];
    if (typeof value === 'number' && Number.isFinite(value)) {
      overrides[key] = Math.trunc(value);
    }
  }
  return overrides;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class SettingsCipher {
  private readonly fernet: Fernet;
  private readonly ttlSeconds?: number;

  constructor(encryptionKey: string, ttlSeconds?: number) {
    this.fernet = new Fernet(encryptionKey);
    this.ttlSeconds = ttlSeconds;
  }

  encrypt(settings: Record<string, unknown>): string {
    return this.fernet.encrypt(JSON.stringify(settings));
  }

  decrypt(token: string): ExecutionOverrides {
    let plaintext: string;
    try {
      plaintext = this.fernet.decrypt(token, { ttlSeconds: this.ttlSeconds }).toString('utf8');
    } catch (error) {
      if (error instanceof CryptoError) {
        throw new SettingsError('invalid_token', 'Invalid encrypted settings token.');
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(plaintext);
    } catch {
      throw new SettingsError('invalid_json', 'Decrypted settings is not valid JSON.');
    }

    if (!isPlainObject(parsed)) {
      throw new SettingsError('not_object', 'Decrypted settings is not a JSON object.');
    }

    return extractOverrides(parsed);
  }
}
