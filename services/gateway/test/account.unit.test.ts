import { MockProviderClient } from '@wxgate/adapters';
import { describe, expect, it } from 'vitest';
import { AccountTools } from '../src/modules/account/index.js';

describe('AccountTools', () => {
  it('returns the ticket with its image URL for a temporary scene', async () => {
    const tools = new AccountTools(new MockProviderClient());

    await expect(tools.createQrcode({ kind: 'temporary', sceneId: 42, expireSeconds: 600 })).resolves.toEqual({
      ticket: 'mock-ticket-1',
      codeUrl: 'https://mp.weixin.qq.com/cgi-bin/showqrcode?ticket=mock-ticket-1',
      url: 'http://weixin.qq.com/q/mock-ticket-1',
      expireSeconds: 600
    });
  });

  it('leaves out the expiry for a permanent scene', async () => {
    const provider = new MockProviderClient();
    const tools = new AccountTools(provider);

    const qrcode = await tools.createQrcode({ kind: 'permanent_str', sceneStr: 'store-7' });

    expect(qrcode.expireSeconds).toBeUndefined();
    expect(provider.getCalls('create_qrcode')[0]?.args).toEqual([{ kind: 'permanent_str', sceneStr: 'store-7' }]);
  });

  it('shortens a URL', async () => {
    const tools = new AccountTools(new MockProviderClient());

    await expect(tools.shortenUrl('https://shop.example.test/promo?id=1')).resolves.toBe('https://w.url.cn/s/mock1');
  });
});
