import { Identity } from '../models/Identity';
import { Role } from '../models/Role';
import { logger } from '../utils/logger';

export type RoleSignal = 'superadmin' | 'group' | 'title' | 'default';

/**
 * One row of the precedence table. `keywords` is a list of alternatives; an
 * alternative matches when all of its terms are present.
 */
export interface RoleRule {
  role: Exclude<Role, 'EMPLOYEE'>;
  source: 'group' | 'title';
  keywords: string[][];
}

export interface RoleResolution {
  role: Role;
  matchedBy: RoleSignal;
  rule?: RoleRule;
  matchedValue?: string;
}

export interface ResolveOptions {
  superadmin?: boolean;
}

/**
 * Ordered precedence table: admin group, then group keywords, then title
 * keywords. First match wins; nothing matching means EMPLOYEE.
 */
export const DEFAULT_ROLE_RULES: readonly RoleRule[] = [
  { role: 'ADMIN', source: 'group', keywords: [['admin']] },
  { role: 'PDL', source: 'group', keywords: [['pdl'], ['program'], ['tpl'], ['project']] },
  { role: 'COE_LEADER', source: 'group', keywords: [['coe'], ['centerofexcellence']] },
  { role: 'TEAM_LEAD', source: 'group', keywords: [['team', 'lead']] },
  { role: 'PDL', source: 'title', keywords: [['pdl'], ['program', 'delivery'], ['program', 'director']] },
  { role: 'COE_LEADER', source: 'title', keywords: [['coe'], ['center', 'excellence'], ['centre', 'excellence']] },
  { role: 'TEAM_LEAD', source: 'title', keywords: [['team', 'lead'], ['lead'], ['manager']] }
];

/**
 * `CN=Portal-Admins,OU=Groups,DC=corp` -> `portal-admins`. Plain names are lower-cased as-is.
 */
export function groupCommonName(group: string): string {
  const match = /^\s*cn=([^,]+)/i.exec(group);
  return (match ? match[1] : group).trim().toLowerCase();
}

// Terms match as substrings of the lower-cased value: "TeamLeads", "Team Leader" and "Managers" all count
function termsMatch(value: string, terms: string[]): boolean {
  return terms.every(term => value.includes(term));
}

/**
 * Maps a directory identity and its group memberships to exactly one role.
 * Total and deterministic; the result is fixed for the session it is stored in.
 */
export class RoleResolver {
  private readonly rules: readonly RoleRule[];
  private readonly adminGroups: ReadonlySet<string>;

  constructor(options: { adminGroups?: string[]; rules?: readonly RoleRule[] } = {}) {
    this.rules = options.rules ?? DEFAULT_ROLE_RULES;
    this.adminGroups = new Set((options.adminGroups ?? []).map(groupCommonName));
  }

  resolve(identity: Identity, groups: string[], options: ResolveOptions = {}): RoleResolution {
    if (options.superadmin) {
      return { role: 'ADMIN', matchedBy: 'superadmin' };
    }

    const commonNames = groups.map(groupCommonName).filter(name => name.length > 0);

    const configuredAdmin = commonNames.find(name => this.adminGroups.has(name));
    if (configuredAdmin !== undefined) {
      return { role: 'ADMIN', matchedBy: 'group', matchedValue: configuredAdmin };
    }

    const title = identity.title.toLowerCase();

    for (const rule of this.rules) {
      if (rule.source === 'group') {
        const hit = commonNames.find(name => rule.keywords.some(terms => termsMatch(name, terms)));
        if (hit !== undefined) {
          return { role: rule.role, matchedBy: 'group', rule, matchedValue: hit };
        }
      } else if (rule.keywords.some(terms => termsMatch(title, terms))) {
        return { role: rule.role, matchedBy: 'title', rule, matchedValue: identity.title };
      }
    }

    // No rule matched
    logger.info('ResolverFallback: no role rule matched, defaulting to EMPLOYEE', {
      username: identity.username,
      title: identity.title,
      groupCount: commonNames.length
    });
    return { role: 'EMPLOYEE', matchedBy: 'default' };
  }

  resolveRole(identity: Identity, groups: string[], options: ResolveOptions = {}): Role {
    return this.resolve(identity, groups, options).role;
  }
}
