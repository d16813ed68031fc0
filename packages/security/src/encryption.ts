import { createCipheriv, createDecipheriv, randomBytes } from 'node:crypto';
import type { KeyProvider } from './key-provider.js';

export interface SealedPayload {
  algo: 'aes-256-gcm';
  keyVersion: string;
  ivB64: string;
  tagB64: string;
  ciphertextB64: string;
}

/**
 * Encrypt `plainText`, binding it to `context` (for sessions, the session id)
 * so a sealed payload copied onto another record fails to open.
 */
export async function seal(plainText: string, context: string, provider: KeyProvider): Promise<SealedPayload> {
  const key = await provider.getActiveKey();
  const iv = randomBytes(12);

  const cipher = createCipheriv('aes-256-gcm', key.keyBytes, iv);
  cipher.setAAD(Buffer.from(context, 'utf8'));
  const encrypted = Buffer.concat([cipher.update(Buffer.from(plainText, 'utf8')), cipher.final()]);

  return {
    algo: 'aes-256-gcm',
    keyVersion: key.keyVersion,
    ivB64: iv.toString('base64'),
    tagB64: cipher.getAuthTag().toString('base64'),
    ciphertextB64: encrypted.toString('base64')
  };
}

export async function openSealed(payload: SealedPayload, context: string, provider: KeyProvider): Promise<string> {
  const key = await provider.getKeyByVersion(payload.keyVersion);

  const decipher = createDecipheriv('aes-256-gcm', key.keyBytes, Buffer.from(payload.ivB64, 'base64'));
  decipher.setAAD(Buffer.from(context, 'utf8'));
  decipher.setAuthTag(Buffer.from(payload.tagB64, 'base64'));

  const decrypted = Buffer.concat([
    decipher.update(Buffer.from(payload.ciphertextB64, 'base64')),
    decipher.final()
  ]);

  return decrypted.toString('utf8');
}
