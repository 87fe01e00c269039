export const ROLES = ['ADMIN', 'PDL', 'TEAM_LEAD', 'COE_LEADER', 'EMPLOYEE'] as const;

export type Role = typeof ROLES[number];

/**
 * Privilege order used wherever a minimum role is required.
 * EMPLOYEE < TEAM_LEAD < COE_LEADER < PDL < ADMIN
 */
const ROLE_RANK: Record<Role, number> = {
  EMPLOYEE: 0,
  TEAM_LEAD: 1,
  COE_LEADER: 2,
  PDL: 3,
  ADMIN: 4
};

export const roleDisplayNames: Record<Role, string> = {
  ADMIN: 'Administrator',
  PDL: 'Program Delivery Lead',
  TEAM_LEAD: 'Team Lead',
  COE_LEADER: 'COE Leader',
  EMPLOYEE: 'Employee'
};

export function satisfiesMinimumRole(role: Role, minimum: Role): boolean {
  return ROLE_RANK[role] >= ROLE_RANK[minimum];
}

/**
 * Every role at or above `minimum`, as an allowed set for the authorization gate.
 */
export function rolesAtLeast(minimum: Role): ReadonlySet<Role> {
  return new Set(ROLES.filter(role => satisfiesMinimumRole(role, minimum)));
}

// Roles that see team-level dashboards
export const TEAM_VIEW_ROLES: ReadonlySet<Role> = rolesAtLeast('TEAM_LEAD');

// Roles that see program-level dashboards
export const PROGRAM_VIEW_ROLES: ReadonlySet<Role> = rolesAtLeast('PDL');
