import type { Group, ProviderClient } from '@wxgate/adapters';
import { UnknownGroupError } from '@wxgate/domain';

/** A group is addressed by numeric id or by name. */
export type GroupRef = number | string;

/**
 * Account-level user groups. The list is fetched once per directory and
 * reused until a write through this directory invalidates it; a directory
 * serves a single request.
 *
 * Names are not unique on the provider side; name lookups take the first
 * exact, case-sensitive match in the order the provider lists groups.
 */
export class GroupDirectory {
  private cached: Promise<Group[]> | null = null;

  constructor(private readonly provider: ProviderClient) {}

  async list(): Promise<Group[]> {
    this.cached ??= this.provider.listGroups().catch((error: unknown) => {
      this.cached = null;
      throw error;
    });
    return this.cached;
  }

  async findById(groupId: number): Promise<Group | undefined> {
    const groups = await this.list();
    return groups.find((group) => group.id === groupId);
  }

  async resolveId(ref: GroupRef): Promise<number> {
    const groups = await this.list();
    const match =
      typeof ref === 'number' ? groups.find((group) => group.id === ref) : groups.find((group) => group.name === ref);
    if (!match) {
      throw new UnknownGroupError(ref);
    }
    return match.id;
  }

  async create(name: string): Promise<Group> {
    const group = await this.provider.createGroup(name);
    this.cached = null;
    return group;
  }

  async rename(ref: GroupRef, name: string): Promise<number> {
    const groupId = await this.resolveId(ref);
    await this.provider.renameGroup(groupId, name);
    this.cached = null;
    return groupId;
  }

  async remove(ref: GroupRef): Promise<number> {
    const groupId = await this.resolveId(ref);
    await this.provider.deleteGroup(groupId);
    this.cached = null;
    return groupId;
  }

  async moveUser(identityId: string, ref: GroupRef): Promise<number> {
    const groupId = await this.resolveId(ref);
    await this.provider.moveUserToGroup(identityId, groupId);
    this.cached = null;
    return groupId;
  }
}
