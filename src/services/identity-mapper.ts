import { AnalyticsPlatformClient } from '../types/analytics-platform';
import { Logger } from '../types/logger';

export const USER_REF_PREFIX = 'user:';
export const GROUP_REF_PREFIX = 'group:';

/**
 * Platform references for users encode the email with `@` replaced by `_`,
 * e.g. `user:jane.doe_acme.com`.
 */
export function userRefFromEmail(email: string): string {
  return USER_REF_PREFIX + email.replace(/@/g, '_');
}

export function groupRefFromName(name: string): string {
  return GROUP_REF_PREFIX + name;
}

/**
 * Identity Mapper
 *
 * Resolves platform user and group references to analytics platform ids.
 * Each call lists the remote principals once. The returned map has an
 * entry for every requested reference; unresolved ones map to null.
 */
export class IdentityMapper {
  constructor(
    private readonly client: AnalyticsPlatformClient,
    private readonly logger: Logger
  ) {}

  async mapUsers(refs: Iterable<string>): Promise<Map<string, string | null>> {
    const users = await this.client.listUsers();

    const lookup = new Map<string, string>();
    for (const user of users) {
      if (!user.email) {
        this.logger.warn(`Platform user ${user.id} is missing email, skipping`);
        continue;
      }
      lookup.set(userRefFromEmail(user.email), user.id);
    }

    return this.resolve(refs, lookup, 'user');
  }

  async mapGroups(refs: Iterable<string>): Promise<Map<string, string | null>> {
    const groups = await this.client.listGroups();

    const lookup = new Map<string, string>();
    for (const group of groups) {
      if (!group.name) {
        this.logger.warn(`Platform group ${group.id} is missing name, skipping`);
        continue;
      }
      lookup.set(groupRefFromName(group.name), group.id);
    }

    return this.resolve(refs, lookup, 'group');
  }

  private resolve(
    refs: Iterable<string>,
    lookup: Map<string, string>,
    principalType: 'user' | 'group'
  ): Map<string, string | null> {
    const mapped = new Map<string, string | null>();
    for (const ref of refs) {
      const id = lookup.get(ref) ?? null;
      if (id === null) {
        this.logger.warn(`Reference ${ref} could not be mapped to a platform ${principalType}`);
      }
      mapped.set(ref, id);
    }
    return mapped;
  }
}

/**
 * Splits a mapping into resolved ids and unresolved references
 */
export function partitionMapping(mapped: Map<string, string | null>): { resolved: string[]; unresolved: string[] } {
  const resolved: string[] = [];
  const unresolved: string[] = [];
  for (const [ref, id] of mapped) {
    if (id === null) {
      unresolved.push(ref);
    } else {
      resolved.push(id);
    }
  }
  return { resolved, unresolved };
}
