import type { ExtendedUserInfo, Group, ProviderClient, UserProfile } from '@wxgate/adapters';
import { ProfileNotLoadedError, SubscriptionRequiredError } from '@wxgate/domain';
import type { GroupDirectory, GroupRef } from './group-directory.js';

export interface UserViewDeps {
  provider: ProviderClient;
  groups: GroupDirectory;
}

/**
 * The signed-in user. Base profile fields come from login; the extended
 * fields (`subscribe`, `language`, `remark`, `groupid`) are fetched on first
 * use and kept for the lifetime of the view.
 */
export class UserView {
  private extended: ExtendedUserInfo | null = null;
  private upgrading: Promise<ExtendedUserInfo> | null = null;

  constructor(
    readonly identityId: string,
    private readonly profile: UserProfile,
    private readonly deps: UserViewDeps
  ) {}

  get upgraded(): boolean {
    return this.extended !== null;
  }

  baseFields(): UserProfile {
    return { ...this.profile };
  }

  /** Looks a field up in the extended fields (when loaded), then the base profile. */
  field(name: string): unknown {
    if (this.extended && name in this.extended) {
      return this.extended[name];
    }
    return name in this.profile ? this.profile[name] : undefined;
  }

  /** Fetches the extended fields once; concurrent callers share the same request. */
  async upgrade(): Promise<ExtendedUserInfo> {
    if (this.extended) {
      return this.extended;
    }

    this.upgrading ??= this.deps.provider
      .getUserInfo(this.identityId)
      .then((info) => {
        this.extended = { remark: '', ...info };
        return this.extended;
      })
      .finally(() => {
        this.upgrading = null;
      });
    return this.upgrading;
  }

  extendedFields(): ExtendedUserInfo {
    if (!this.extended) {
      throw new ProfileNotLoadedError();
    }
    return { ...this.extended };
  }

  async subscribe(): Promise<number> {
    return (await this.upgrade()).subscribe;
  }

  async language(): Promise<string | undefined> {
    return (await this.upgrade()).language;
  }

  async remark(): Promise<string> {
    return (await this.upgrade()).remark ?? '';
  }

  async groupId(): Promise<number | undefined> {
    return (await this.upgrade()).groupid;
  }

  async group(): Promise<Group | null> {
    const groupId = await this.groupId();
    if (groupId === undefined) {
      return null;
    }
    return (await this.deps.groups.findById(groupId)) ?? null;
  }

  /** Writes through only when the value changes. Unfollowed users cannot carry a remark. */
  async setRemark(value: string): Promise<void> {
    const info = await this.upgrade();
    if (info.subscribe !== 1) {
      throw new SubscriptionRequiredError(this.identityId);
    }
    if (info.remark === value) {
      return;
    }

    await this.deps.provider.setUserRemark(this.identityId, value);
    this.extended = { ...info, remark: value };
  }

  async setGroup(ref: GroupRef): Promise<number> {
    const groupId = await this.deps.groups.moveUser(this.identityId, ref);
    if (this.extended) {
      this.extended = { ...this.extended, groupid: groupId };
    }
    return groupId;
  }

  toJSON(): Record<string, unknown> {
    return { ...this.profile, ...(this.extended ?? {}) };
  }
}
