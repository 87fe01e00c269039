/**
 * Which allocation records a caller may see. Resolved from the caller's role
 * before any query runs.
 */
export type VisibilityScope =
  | { kind: 'all' }
  | { kind: 'users'; usernames: string[] }
  | { kind: 'programOwner'; owners: string[] };

export interface AllocationFilters {
  year: number;
  month?: number;
  program?: string;
}

export interface UserHoursRow {
  username: string;
  plannedHours: number;
  actualHours: number;
}

export interface MonthlyHoursRow {
  month: number;
  plannedHours: number;
  actualHours: number;
}

export interface ProjectHoursRow {
  projectId: number;
  projectName: string;
  plannedHours: number;
}

export interface ProgramHoursRow {
  program: string;
  plannedHours: number;
  actualHours: number;
}

export interface FilterOptionRows {
  years: number[];
  programs: string[];
}

export interface ReporteeFte {
  username: string;
  name: string;
  plannedFte: number;
  actualFte: number;
}

export interface TeamDashboard {
  filters: { year: number; month: number | null; program: string | null };
  teamCapacity: number;
  teamActual: number;
  reportees: ReporteeFte[];
  deviation: { labels: string[]; planned: number[]; consumed: number[] };
  fteProjects: { labels: string[]; fte: number[] };
  selfAllocation: { labels: string[]; fte: number[] };
}

export interface UserStats {
  thisMonthHours: number;
  utilizationPercent: number;
  remainingHours: number;
}

export interface ManagerTotals {
  teamAllocatedHours: number;
  billingRatio: string;
  reporteeCount: number;
}

export interface HomeSummary {
  year: number;
  month: number;
  userStats: UserStats;
  topAllocations: ProjectHoursRow[];
  managerTotals: ManagerTotals | null;
}

export interface DashboardFilterOptions {
  years: number[];
  months: Array<{ value: number; label: string }>;
  programs: string[];
}

/**
 * Query collaborator for allocation aggregates. Implementations never decide
 * visibility themselves; they apply the scope they are handed.
 */
export interface AllocationQueries {
  getFilterOptions(scope: VisibilityScope): Promise<FilterOptionRows>;
  getMonthlyHoursLimit(year: number, month: number): Promise<number | null>;
  getHoursByUser(filters: AllocationFilters, scope: VisibilityScope): Promise<UserHoursRow[]>;
  getMonthlySeries(filters: AllocationFilters, scope: VisibilityScope): Promise<MonthlyHoursRow[]>;
  getHoursByProject(filters: AllocationFilters, scope: VisibilityScope): Promise<ProjectHoursRow[]>;
  getHoursByProgram(filters: AllocationFilters, scope: VisibilityScope): Promise<ProgramHoursRow[]>;
  getTopProjectsForUser(username: string, limit: number): Promise<ProjectHoursRow[]>;
}
