import {
  AllocationFilters,
  AllocationQueries,
  DashboardFilterOptions,
  HomeSummary,
  ManagerTotals,
  ProgramHoursRow,
  TeamDashboard,
  UserHoursRow,
  VisibilityScope
} from '../models/Allocation';
import { Identity } from '../models/Identity';
import { TEAM_VIEW_ROLES } from '../models/Role';
import { AuthenticatedSession } from '../models/Session';
import { logger } from '../utils/logger';
import { DirectoryService } from './DirectoryService';

const MONTH_NAMES = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December'
];

const TOP_ALLOCATION_LIMIT = 10;

const round2 = (value: number): number => Math.round(value * 100) / 100;
const round1 = (value: number): number => Math.round(value * 10) / 10;

export interface DashboardServiceOptions {
  allocations: AllocationQueries;
  directory: Pick<DirectoryService, 'fetchReportees'>;
  hoursPerFteMonth: number;
  now?: () => Date;
}

interface Audience {
  scope: VisibilityScope;
  reportees: Identity[];
}

/**
 * Dashboard aggregates for the signed-in principal. Every operation resolves
 * what the caller may see before asking the allocation store for numbers.
 */
export class DashboardService {
  private readonly allocations: AllocationQueries;
  private readonly directory: Pick<DirectoryService, 'fetchReportees'>;
  private readonly hoursPerFteMonth: number;
  private readonly now: () => Date;

  constructor(options: DashboardServiceOptions) {
    this.allocations = options.allocations;
    this.directory = options.directory;
    this.hoursPerFteMonth = options.hoursPerFteMonth;
    this.now = options.now ?? (() => new Date());
  }

  async resolveScope(principal: AuthenticatedSession): Promise<VisibilityScope> {
    return (await this.resolveAudience(principal)).scope;
  }

  async getFilterOptions(principal: AuthenticatedSession): Promise<DashboardFilterOptions> {
    const { scope } = await this.resolveAudience(principal);
    const rows = await this.allocations.getFilterOptions(scope);

    const years = new Set(rows.years);
    years.add(this.now().getFullYear());

    return {
      years: [...years].sort((a, b) => a - b),
      months: MONTH_NAMES.map((label, index) => ({ value: index + 1, label })),
      programs: rows.programs
    };
  }

  async getTeamDashboard(principal: AuthenticatedSession, filters: AllocationFilters): Promise<TeamDashboard> {
    const { scope, reportees } = await this.resolveAudience(principal);
    const fteHours = await this.fteHours(filters);

    const [byUser, series, byProject, self] = await Promise.all([
      this.allocations.getHoursByUser(filters, scope),
      this.allocations.getMonthlySeries(filters, scope),
      this.allocations.getHoursByProject(filters, scope),
      this.allocations.getHoursByProject(filters, { kind: 'users', usernames: [principal.identity.username] })
    ]);

    const names = new Map<string, string>(reportees.map(person => [person.username, person.displayName]));
    names.set(principal.identity.username, principal.identity.displayName);

    const hoursByUser = new Map<string, UserHoursRow>(byUser.map(row => [row.username, row]));
    const members = scope.kind === 'users' ? scope.usernames : byUser.map(row => row.username);

    const memberFte = members.map(username => {
      const row = hoursByUser.get(username);
      return {
        username,
        name: names.get(username) ?? username,
        plannedFte: round2((row?.plannedHours ?? 0) / fteHours),
        actualFte: round2((row?.actualHours ?? 0) / fteHours)
      };
    });

    const planned = new Array<number>(12).fill(0);
    const consumed = new Array<number>(12).fill(0);
    for (const row of series) {
      if (row.month >= 1 && row.month <= 12) {
        planned[row.month - 1] = round2(row.plannedHours);
        consumed[row.month - 1] = round2(row.actualHours);
      }
    }

    return {
      filters: {
        year: filters.year,
        month: filters.month ?? null,
        program: filters.program ?? null
      },
      teamCapacity: members.length,
      teamActual: round2(memberFte.reduce((sum, member) => sum + member.actualFte, 0)),
      reportees: memberFte,
      deviation: { labels: MONTH_NAMES.map(name => name.slice(0, 3)), planned, consumed },
      fteProjects: {
        labels: byProject.map(row => row.projectName),
        fte: byProject.map(row => round2(row.plannedHours / fteHours))
      },
      selfAllocation: {
        labels: self.map(row => row.projectName),
        fte: self.map(row => round2(row.plannedHours / fteHours))
      }
    };
  }

  async getHome(principal: AuthenticatedSession, period: { year: number; month: number }): Promise<HomeSummary> {
    const { username } = principal.identity;
    const limit = (await this.allocations.getMonthlyHoursLimit(period.year, period.month)) ?? this.hoursPerFteMonth;

    const [ownRows, topAllocations] = await Promise.all([
      this.allocations.getHoursByUser(period, { kind: 'users', usernames: [username] }),
      this.allocations.getTopProjectsForUser(username, TOP_ALLOCATION_LIMIT)
    ]);

    const thisMonthHours = round2(ownRows.reduce((sum, row) => sum + row.plannedHours, 0));

    return {
      year: period.year,
      month: period.month,
      userStats: {
        thisMonthHours,
        utilizationPercent: round1((thisMonthHours / limit) * 100),
        remainingHours: round2(Math.max(limit - thisMonthHours, 0))
      },
      topAllocations,
      managerTotals: TEAM_VIEW_ROLES.has(principal.role)
        ? await this.managerTotals(principal, period.year)
        : null
    };
  }

  async getProgramBreakdown(
    principal: AuthenticatedSession,
    filters: AllocationFilters
  ): Promise<{ items: ProgramHoursRow[] }> {
    const { scope } = await this.resolveAudience(principal);
    const rows = await this.allocations.getHoursByProgram(filters, scope);

    return {
      items: rows.map(row => ({
        program: row.program,
        plannedHours: round2(row.plannedHours),
        actualHours: round2(row.actualHours)
      }))
    };
  }

  private async managerTotals(principal: AuthenticatedSession, year: number): Promise<ManagerTotals> {
    const { scope, reportees } = await this.resolveAudience(principal);
    const self = principal.identity.username;

    if (scope.kind === 'users' && reportees.length === 0) {
      return { teamAllocatedHours: 0, billingRatio: '0%', reporteeCount: 0 };
    }

    const rows = (await this.allocations.getHoursByUser({ year }, scope)).filter(row => row.username !== self);
    const teamAllocatedHours = round2(rows.reduce((sum, row) => sum + row.plannedHours, 0));
    const reporteeCount = scope.kind === 'users' ? reportees.length : rows.length;
    const billingRatio = reporteeCount
      ? round1((teamAllocatedHours / (reporteeCount * this.hoursPerFteMonth)) * 100)
      : 0;

    return { teamAllocatedHours, billingRatio: `${billingRatio}%`, reporteeCount };
  }

  private async fteHours(filters: AllocationFilters): Promise<number> {
    if (filters.month === undefined) {
      return this.hoursPerFteMonth * 12;
    }
    const limit = await this.allocations.getMonthlyHoursLimit(filters.year, filters.month);
    return limit ?? this.hoursPerFteMonth;
  }

  private async resolveAudience(principal: AuthenticatedSession): Promise<Audience> {
    const { identity, role, directoryCredential } = principal;

    switch (role) {
      case 'ADMIN':
        return { scope: { kind: 'all' }, reportees: [] };

      case 'PDL': {
        const owners = [identity.username, identity.email].filter(owner => owner.length > 0);
        return { scope: { kind: 'programOwner', owners }, reportees: [] };
      }

      case 'TEAM_LEAD':
      case 'COE_LEADER': {
        if (!identity.distinguishedName || !directoryCredential) {
          logger.debug('No directory context for reportee lookup', { username: identity.username });
          return { scope: { kind: 'users', usernames: [identity.username] }, reportees: [] };
        }

        const reportees = await this.directory.fetchReportees(identity.distinguishedName, directoryCredential);
        const usernames = [identity.username, ...reportees.map(person => person.username)];
        return { scope: { kind: 'users', usernames: [...new Set(usernames)] }, reportees };
      }

      case 'EMPLOYEE':
        return { scope: { kind: 'users', usernames: [identity.username] }, reportees: [] };
    }
  }
}
