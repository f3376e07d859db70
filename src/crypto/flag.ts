import { createHmac } from 'crypto';
import { CryptoError } from '../errors';

/**
 * HMAC-SHA256 of a program's stdout, hex encoded. A missing stdout hashes as
 * the empty string.
 */
export function generateFlag(signatureKey: string, output: string | null | undefined): string {
  return createHmac('sha256', Buffer.from(signatureKey, 'utf8'))
    .update(Buffer.from(output ?? '', 'utf8'))
    .digest('hex');
}

export class FlagSigner {
  private readonly key: string;

  constructor(signatureKey: string) {
    if (!signatureKey) {
      throw new CryptoError('Signature key must not be empty');
    }
    this.key = signatureKey;
  }

  sign(output: string | null | undefined): string {
    return generateFlag(this.key, output);
  }
}
