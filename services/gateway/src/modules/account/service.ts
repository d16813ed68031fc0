import type { ProviderClient, QrcodeScene } from '@wxgate/adapters';

const SHOW_QRCODE_URL = 'https://mp.weixin.qq.com/cgi-bin/showqrcode';

export interface SceneQrcode {
  ticket: string;
  /** Image URL for the ticket. */
  codeUrl: string;
  /** Content encoded in the QR image. */
  url?: string;
  expireSeconds?: number;
}

export class AccountTools {
  constructor(private readonly provider: ProviderClient) {}

  async createQrcode(scene: QrcodeScene): Promise<SceneQrcode> {
    const ticket = await this.provider.createQrcode(scene);
    return {
      ticket: ticket.ticket,
      codeUrl: `${SHOW_QRCODE_URL}?ticket=${encodeURIComponent(ticket.ticket)}`,
      ...(ticket.url !== undefined ? { url: ticket.url } : {}),
      ...(ticket.expire_seconds !== undefined ? { expireSeconds: ticket.expire_seconds } : {})
    };
  }

  shortenUrl(longUrl: string): Promise<string> {
    return this.provider.shortenUrl(longUrl);
  }
}
