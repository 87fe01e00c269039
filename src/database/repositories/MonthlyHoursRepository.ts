import { QueryResultRow } from 'pg';
import { MonthlyHoursStore, MonthlyHoursUpdate, StoredMonthlyHoursLimit } from '../../models/MonthlyHours';
import { mapDatabaseError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { QueryExecutor } from '../connection';

const toNullableDate = (value: unknown): string | null =>
  typeof value === 'string' && value.length > 0 ? value : null;

/**
 * Reads and writes `monthly_hours_limit`, keyed by (year, month).
 */
export class MonthlyHoursRepository implements MonthlyHoursStore {
  private readonly db: QueryExecutor;

  constructor(db: QueryExecutor) {
    this.db = db;
  }

  async findByYear(year: number): Promise<StoredMonthlyHoursLimit[]> {
    // Dates come back as text so no timezone shift applies
    const rows = await this.run(
      `SELECT month,
              max_hours,
              to_char(start_date, 'YYYY-MM-DD') AS start_date,
              to_char(end_date, 'YYYY-MM-DD') AS end_date
       FROM monthly_hours_limit
       WHERE year = $1
       ORDER BY month`,
      [year]
    );

    return rows.map(row => ({
      month: Number(row.month),
      maxHours: Number(row.max_hours),
      startDate: toNullableDate(row.start_date),
      endDate: toNullableDate(row.end_date)
    }));
  }

  /**
   * Inserts or replaces every given month in one statement.
   */
  async upsert(year: number, updates: MonthlyHoursUpdate[]): Promise<void> {
    if (updates.length === 0) {
      return;
    }

    const params: unknown[] = [year];
    const values = updates.map(update => {
      params.push(update.month, update.maxHours, update.startDate ?? null, update.endDate ?? null);
      const base = params.length - 4;
      return `($1, $${base + 1}, $${base + 2}, $${base + 3}::date, $${base + 4}::date)`;
    });

    await this.run(
      `INSERT INTO monthly_hours_limit (year, month, max_hours, start_date, end_date)
       VALUES ${values.join(', ')}
       ON CONFLICT (year, month) DO UPDATE SET
         max_hours = EXCLUDED.max_hours,
         start_date = EXCLUDED.start_date,
         end_date = EXCLUDED.end_date,
         updated_at = NOW()`,
      params
    );
  }

  private async run(text: string, params: unknown[]): Promise<QueryResultRow[]> {
    try {
      const result = await this.db.query(text, params);
      return result.rows;
    } catch (error) {
      logger.error('Monthly hours query failed', {
        error: error instanceof Error ? error.message : String(error)
      });
      throw mapDatabaseError(error);
    }
  }
}
