import { MockProviderClient } from '@wxgate/adapters';
import { ProfileNotLoadedError, SubscriptionRequiredError, UnknownGroupError } from '@wxgate/domain';
import { describe, expect, it } from 'vitest';
import { GroupDirectory, UserView } from '../src/modules/users/index.js';

function setup(subscribe = 1) {
  const provider = new MockProviderClient();
  provider.users.set('openid-1', { subscribe, openid: 'openid-1', language: 'en', groupid: 0 });
  provider.groups = [
    { id: 0, name: 'Default', count: 10 },
    { id: 101, name: 'VIP', count: 2 },
    { id: 102, name: 'VIP', count: 0 }
  ];
  const groups = new GroupDirectory(provider);
  const user = new UserView('openid-1', { openid: 'openid-1', nickname: 'Ada' }, { provider, groups });
  return { provider, groups, user };
}

describe('UserView', () => {
  it('exposes base fields without any provider call', () => {
    const { provider, user } = setup();

    expect(user.field('nickname')).toBe('Ada');
    expect(user.field('language')).toBeUndefined();
    expect(user.upgraded).toBe(false);
    expect(() => user.extendedFields()).toThrow(ProfileNotLoadedError);
    expect(provider.getCalls()).toHaveLength(0);
  });

  it('fetches the extended fields once', async () => {
    const { provider, user } = setup();

    expect(await user.language()).toBe('en');
    expect(await user.subscribe()).toBe(1);
    expect(await user.remark()).toBe('');
    expect(user.field('language')).toBe('en');
    expect(provider.getCalls('user_info')).toHaveLength(1);
  });

  it('shares one fetch between concurrent upgrades', async () => {
    const { provider, user } = setup();

    const [first, second] = await Promise.all([user.upgrade(), user.upgrade()]);

    expect(first).toBe(second);
    expect(provider.getCalls('user_info')).toHaveLength(1);
  });

  it('refuses a remark for a user who does not follow the account', async () => {
    const { provider, user } = setup(0);

    await expect(user.setRemark('friend')).rejects.toThrow(SubscriptionRequiredError);
    expect(provider.getCalls('set_remark')).toHaveLength(0);
  });

  it('writes a changed remark and skips an unchanged one', async () => {
    const { provider, user } = setup();

    await user.setRemark('friend');
    await user.setRemark('friend');

    expect(provider.getCalls('set_remark')).toEqual([{ operation: 'set_remark', args: ['openid-1', 'friend'] }]);
    expect(await user.remark()).toBe('friend');
  });

  it('resolves its group through the directory', async () => {
    const { user } = setup();

    expect(await user.group()).toEqual({ id: 0, name: 'Default', count: 10 });
  });

  it('moves to the first group matching a name', async () => {
    const { provider, user } = setup();
    await user.upgrade();

    expect(await user.setGroup('VIP')).toBe(101);
    expect(provider.getCalls('move_user')[0]?.args).toEqual(['openid-1', 101]);
    expect(await user.groupId()).toBe(101);
  });

  it('rejects an unknown group without moving the user', async () => {
    const { provider, user } = setup();

    await expect(user.setGroup('Nobody')).rejects.toThrow(UnknownGroupError);
    expect(provider.getCalls('move_user')).toHaveLength(0);
  });
});

describe('GroupDirectory', () => {
  it('memoizes the listing within one directory until a write', async () => {
    const { provider, groups } = setup();

    await groups.list();
    await groups.resolveId(101);
    expect(provider.getCalls('list_groups')).toHaveLength(1);

    const created = await groups.create('Staff');
    expect(created).toEqual({ id: 103, name: 'Staff', count: 0 });

    expect((await groups.list()).map((group) => group.name)).toEqual(['Default', 'VIP', 'VIP', 'Staff']);
    expect(provider.getCalls('list_groups')).toHaveLength(2);
  });

  it('sees a group created elsewhere from a fresh directory', async () => {
    const { provider, groups } = setup();
    await expect(groups.resolveId('Gold')).rejects.toThrow(UnknownGroupError);

    provider.groups.push({ id: 200, name: 'Gold', count: 0 });

    expect(await new GroupDirectory(provider).resolveId('Gold')).toBe(200);
    expect(provider.getCalls('list_groups')).toHaveLength(2);
  });

  it('renames and removes by name or id', async () => {
    const { provider, groups } = setup();

    expect(await groups.rename('VIP', 'Gold')).toBe(101);
    expect(await groups.remove(102)).toBe(102);

    expect(provider.groups).toEqual([
      { id: 0, name: 'Default', count: 10 },
      { id: 101, name: 'Gold', count: 2 }
    ]);
  });

  it('retries the listing after a failure', async () => {
    const { provider, groups } = setup();
    provider.failNext('list_groups', new Error('socket hang up'));

    await expect(groups.list()).rejects.toThrow('socket hang up');
    expect(await groups.list()).toHaveLength(3);
  });

  it('rejects unknown ids with the id in the message', async () => {
    const { groups } = setup();

    await expect(groups.resolveId(999)).rejects.toThrow('Group #999 does not exist.');
  });
});
