import { QueryResultRow } from 'pg';
import {
  AllocationFilters,
  AllocationQueries,
  FilterOptionRows,
  MonthlyHoursRow,
  ProgramHoursRow,
  ProjectHoursRow,
  UserHoursRow,
  VisibilityScope
} from '../../models/Allocation';
import { mapDatabaseError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { QueryExecutor } from '../connection';

interface ColumnMap {
  date: string;
  user: string;
}

// Planned hours live on the monthly entry; actual hours on the punches against it
const PLANNED: ColumnMap = { date: 'm.month_start', user: 'm.user_ldap' };
const ACTUAL: ColumnMap = { date: 'u.punch_date', user: 'u.user_ldap' };

const PLANNED_FROM = `
  FROM monthly_allocation_entries m
  JOIN projects p ON p.id = m.project_id`;

const ACTUAL_FROM = `
  FROM user_punches u
  JOIN monthly_allocation_entries m ON m.id = u.allocation_id
  JOIN projects p ON p.id = m.project_id`;

/**
 * Parameterised WHERE clause shared by the planned and actual halves of a
 * query. Values are bound once; each half renders them against its own columns.
 */
class Conditions {
  readonly params: unknown[] = [];
  private readonly fragments: Array<(columns: ColumnMap) => string> = [];

  static for(filters: Partial<AllocationFilters>, scope: VisibilityScope): Conditions {
    const conditions = new Conditions();

    if (filters.year !== undefined) {
      const p = conditions.bind(filters.year);
      conditions.fragments.push(c => `EXTRACT(YEAR FROM ${c.date}) = ${p}`);
    }
    if (filters.month !== undefined) {
      const p = conditions.bind(filters.month);
      conditions.fragments.push(c => `EXTRACT(MONTH FROM ${c.date}) = ${p}`);
    }
    if (filters.program) {
      const p = conditions.bind(filters.program);
      conditions.fragments.push(() => `p.program = ${p}`);
    }

    switch (scope.kind) {
      case 'all':
        break;
      case 'users': {
        const p = conditions.bind(scope.usernames);
        conditions.fragments.push(c => `${c.user} = ANY(${p})`);
        break;
      }
      case 'programOwner': {
        const p = conditions.bind(scope.owners);
        conditions.fragments.push(() => `p.pdl_user_ldap = ANY(${p})`);
        break;
      }
    }

    return conditions;
  }

  bind(value: unknown): string {
    this.params.push(value);
    return `$${this.params.length}`;
  }

  where(columns: ColumnMap): string {
    if (this.fragments.length === 0) {
      return '';
    }
    return `WHERE ${this.fragments.map(fragment => fragment(columns)).join(' AND ')}`;
  }
}

const toNumber = (value: unknown): number => {
  const parsed = typeof value === 'number' ? value : Number(value ?? 0);
  return Number.isFinite(parsed) ? parsed : 0;
};

/**
 * Read-only aggregate queries over the allocation tables. Visibility is
 * decided by the caller and arrives as a VisibilityScope.
 */
export class AllocationRepository implements AllocationQueries {
  private readonly db: QueryExecutor;

  constructor(db: QueryExecutor) {
    this.db = db;
  }

  async getFilterOptions(scope: VisibilityScope): Promise<FilterOptionRows> {
    const conditions = Conditions.for({}, scope);
    const scoped = conditions.where(PLANNED);
    const programWhere = scoped
      ? `${scoped} AND p.program IS NOT NULL AND p.program <> ''`
      : `WHERE p.program IS NOT NULL AND p.program <> ''`;

    const years = await this.run(
      `SELECT DISTINCT EXTRACT(YEAR FROM m.month_start)::int AS year
       ${PLANNED_FROM}
       ${scoped}
       ORDER BY year`,
      conditions.params
    );
    const programs = await this.run(
      `SELECT DISTINCT p.program AS program
       ${PLANNED_FROM}
       ${programWhere}
       ORDER BY program`,
      conditions.params
    );

    return {
      years: years.map(row => toNumber(row.year)),
      programs: programs.map(row => String(row.program))
    };
  }

  async getMonthlyHoursLimit(year: number, month: number): Promise<number | null> {
    const rows = await this.run(
      'SELECT max_hours FROM monthly_hours_limit WHERE year = $1 AND month = $2 LIMIT 1',
      [year, month]
    );
    const limit = rows[0] ? toNumber(rows[0].max_hours) : 0;
    return limit > 0 ? limit : null;
  }

  async getHoursByUser(filters: AllocationFilters, scope: VisibilityScope): Promise<UserHoursRow[]> {
    const conditions = Conditions.for(filters, scope);
    const rows = await this.run(
      `WITH planned AS (
         SELECT m.user_ldap AS username, SUM(m.total_hours) AS hours
         ${PLANNED_FROM}
         ${conditions.where(PLANNED)}
         GROUP BY m.user_ldap
       ), actual AS (
         SELECT u.user_ldap AS username, SUM(u.actual_hours) AS hours
         ${ACTUAL_FROM}
         ${conditions.where(ACTUAL)}
         GROUP BY u.user_ldap
       )
       SELECT COALESCE(planned.username, actual.username) AS username,
              COALESCE(planned.hours, 0) AS planned_hours,
              COALESCE(actual.hours, 0) AS actual_hours
       FROM planned
       FULL OUTER JOIN actual ON actual.username = planned.username
       ORDER BY username`,
      conditions.params
    );

    return rows.map(row => ({
      username: String(row.username),
      plannedHours: toNumber(row.planned_hours),
      actualHours: toNumber(row.actual_hours)
    }));
  }

  async getMonthlySeries(filters: AllocationFilters, scope: VisibilityScope): Promise<MonthlyHoursRow[]> {
    const conditions = Conditions.for({ year: filters.year, program: filters.program }, scope);
    const rows = await this.run(
      `WITH planned AS (
         SELECT EXTRACT(MONTH FROM m.month_start)::int AS month, SUM(m.total_hours) AS hours
         ${PLANNED_FROM}
         ${conditions.where(PLANNED)}
         GROUP BY 1
       ), actual AS (
         SELECT EXTRACT(MONTH FROM u.punch_date)::int AS month, SUM(u.actual_hours) AS hours
         ${ACTUAL_FROM}
         ${conditions.where(ACTUAL)}
         GROUP BY 1
       )
       SELECT COALESCE(planned.month, actual.month) AS month,
              COALESCE(planned.hours, 0) AS planned_hours,
              COALESCE(actual.hours, 0) AS actual_hours
       FROM planned
       FULL OUTER JOIN actual ON actual.month = planned.month
       ORDER BY month`,
      conditions.params
    );

    return rows.map(row => ({
      month: toNumber(row.month),
      plannedHours: toNumber(row.planned_hours),
      actualHours: toNumber(row.actual_hours)
    }));
  }

  async getHoursByProject(filters: AllocationFilters, scope: VisibilityScope): Promise<ProjectHoursRow[]> {
    const conditions = Conditions.for(filters, scope);
    const rows = await this.run(
      `SELECT p.id AS project_id, p.name AS project_name, SUM(m.total_hours) AS planned_hours
       ${PLANNED_FROM}
       ${conditions.where(PLANNED)}
       GROUP BY p.id, p.name
       ORDER BY planned_hours DESC, p.name`,
      conditions.params
    );

    return rows.map(row => ({
      projectId: toNumber(row.project_id),
      projectName: String(row.project_name ?? ''),
      plannedHours: toNumber(row.planned_hours)
    }));
  }

  async getHoursByProgram(filters: AllocationFilters, scope: VisibilityScope): Promise<ProgramHoursRow[]> {
    const conditions = Conditions.for(filters, scope);
    const rows = await this.run(
      `WITH planned AS (
         SELECT COALESCE(NULLIF(p.program, ''), 'Unknown') AS program, SUM(m.total_hours) AS hours
         ${PLANNED_FROM}
         ${conditions.where(PLANNED)}
         GROUP BY 1
       ), actual AS (
         SELECT COALESCE(NULLIF(p.program, ''), 'Unknown') AS program, SUM(u.actual_hours) AS hours
         ${ACTUAL_FROM}
         ${conditions.where(ACTUAL)}
         GROUP BY 1
       )
       SELECT COALESCE(planned.program, actual.program) AS program,
              COALESCE(planned.hours, 0) AS planned_hours,
              COALESCE(actual.hours, 0) AS actual_hours
       FROM planned
       FULL OUTER JOIN actual ON actual.program = planned.program
       ORDER BY program`,
      conditions.params
    );

    return rows.map(row => ({
      program: String(row.program),
      plannedHours: toNumber(row.planned_hours),
      actualHours: toNumber(row.actual_hours)
    }));
  }

  async getTopProjectsForUser(username: string, limit: number): Promise<ProjectHoursRow[]> {
    const rows = await this.run(
      `SELECT p.id AS project_id, p.name AS project_name, SUM(m.total_hours) AS planned_hours
       ${PLANNED_FROM}
       WHERE m.user_ldap = $1
       GROUP BY p.id, p.name
       ORDER BY planned_hours DESC, p.name
       LIMIT $2`,
      [username, limit]
    );

    return rows.map(row => ({
      projectId: toNumber(row.project_id),
      projectName: String(row.project_name ?? ''),
      plannedHours: toNumber(row.planned_hours)
    }));
  }

  private async run(text: string, params: unknown[]): Promise<QueryResultRow[]> {
    try {
      const result = await this.db.query(text, params);
      return result.rows;
    } catch (error) {
      logger.error('Allocation query failed', {
        error: error instanceof Error ? error.message : String(error)
      });
      throw mapDatabaseError(error);
    }
  }
}
