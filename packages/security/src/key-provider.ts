import { createHash } from 'node:crypto';

export interface KeyMaterial {
  keyVersion: string;
  keyBytes: Buffer;
}

export interface KeyProvider {
  getActiveKey(): Promise<KeyMaterial>;
  getKeyByVersion(version: string): Promise<KeyMaterial>;
}

/**
 * Holds one active key plus any retired versions still needed to open
 * existing sessions. Without a configured key a development key is derived
 * from the version label.
 */
export class StaticKeyProvider implements KeyProvider {
  private readonly keys = new Map<string, Buffer>();

  constructor(
    private readonly options: {
      keyVersion: string;
      base64Key?: string;
      retired?: Record<string, string>;
    }
  ) {
    this.keys.set(options.keyVersion, StaticKeyProvider.decode(options.keyVersion, options.base64Key));
    for (const [version, base64Key] of Object.entries(options.retired ?? {})) {
      this.keys.set(version, StaticKeyProvider.decode(version, base64Key));
    }
  }

  private static decode(version: string, base64Key: string | undefined): Buffer {
    const keyBytes = base64Key
      ? Buffer.from(base64Key, 'base64')
      : createHash('sha256').update(`wxgate-session:${version}`).digest();
    if (keyBytes.length !== 32) {
      throw new Error(`Session key ${version} must be 32 bytes for AES-256-GCM.`);
    }
    return keyBytes;
  }

  async getActiveKey(): Promise<KeyMaterial> {
    return this.getKeyByVersion(this.options.keyVersion);
  }

  async getKeyByVersion(version: string): Promise<KeyMaterial> {
    const keyBytes = this.keys.get(version);
    if (!keyBytes) {
      throw new Error(`Unknown key version: ${version}`);
    }

    return { keyVersion: version, keyBytes };
  }
}
