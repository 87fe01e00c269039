import {
  MonthlyHoursSetting,
  MonthlyHoursStore,
  MonthlyHoursUpdate,
  MonthlyHoursYear
} from '../models/MonthlyHours';
import { ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';

const pad = (value: number): string => String(value).padStart(2, '0');

const firstDayOf = (year: number, month: number): string => `${year}-${pad(month)}-01`;

const lastDayOf = (year: number, month: number): string =>
  `${year}-${pad(month)}-${pad(new Date(Date.UTC(year, month, 0)).getUTCDate())}`;

const isCalendarDate = (value: string): boolean => {
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
};

/**
 * Monthly working-hours limits. Months with nothing stored read as the
 * configured default limit over the whole calendar month.
 */
export class MonthlyHoursService {
  private readonly store: MonthlyHoursStore;
  private readonly defaultMaxHours: number;

  constructor(store: MonthlyHoursStore, defaultMaxHours: number) {
    this.store = store;
    this.defaultMaxHours = defaultMaxHours;
  }

  async getYear(year: number): Promise<MonthlyHoursYear> {
    const stored = new Map((await this.store.findByYear(year)).map(row => [row.month, row]));

    const months: MonthlyHoursSetting[] = [];
    for (let month = 1; month <= 12; month++) {
      const row = stored.get(month);
      months.push({
        month,
        maxHours: row && row.maxHours > 0 ? row.maxHours : this.defaultMaxHours,
        startDate: row?.startDate ?? firstDayOf(year, month),
        endDate: row?.endDate ?? lastDayOf(year, month)
      });
    }

    return { year, months };
  }

  async saveYear(year: number, updates: MonthlyHoursUpdate[], savedBy: string): Promise<MonthlyHoursYear> {
    const problems: Array<{ field: string; message: string }> = [];

    updates.forEach((update, index) => {
      for (const key of ['startDate', 'endDate'] as const) {
        const value = update[key];
        if (value && !isCalendarDate(value)) {
          problems.push({ field: `months.${index}.${key}`, message: `"${key}" is not a calendar date` });
        }
      }
      if (update.startDate && update.endDate && update.startDate > update.endDate) {
        problems.push({ field: `months.${index}.endDate`, message: '"endDate" must not be before "startDate"' });
      }
    });

    if (problems.length > 0) {
      throw new ValidationError('Validation failed', problems);
    }

    await this.store.upsert(year, updates);

    logger.info('Monthly hours limits saved', {
      year,
      months: updates.map(update => update.month),
      savedBy
    });

    return this.getYear(year);
  }
}
