import { errorMessage } from '../errors';
import { FlagSigner } from './flag';
import { SettingsCipher } from './settings';

export { Fernet } from './fernet';
export { FlagSigner, generateFlag } from './flag';
export { SettingsCipher, extractOverrides } from './settings';

export interface SchedulerCrypto {
  settings: SettingsCipher | null;
  signer: FlagSigner | null;
}

export interface SchedulerCryptoConfig {
  encryptionKey?: string;
  signatureKey?: string;
  settingsTtlSeconds?: number;
}

/**
 * Builds the two independent keyed primitives. A missing or unusable key is
 * logged and left null; the scheduler then refuses every submission.
 */
export function initSchedulerCrypto(config: SchedulerCryptoConfig): SchedulerCrypto {
  let settings: SettingsCipher | null = null;
  let signer: FlagSigner | null = null;

  if (!config.encryptionKey) {
    console.error('Scheduler: ENCRYPTION_KEY is not set. Submissions will be rejected.');
  } else {
    try {
      settings = new SettingsCipher(config.encryptionKey, config.settingsTtlSeconds);
      console.log('Scheduler: Settings cipher initialized');
    } catch (error) {
      console.error(`Scheduler: Failed to initialize settings cipher: ${errorMessage(error)}`);
    }
  }

  if (!config.signatureKey) {
    console.error('Scheduler: SIGNATURE_KEY is not set. Submissions will be rejected.');
  } else {
    signer = new FlagSigner(config.signatureKey);
  }

  return { settings, signer };
}
