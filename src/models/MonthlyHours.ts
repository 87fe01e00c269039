/**
 * Working-hours limit of one calendar month. The limit is the FTE denominator
 * for that month; the dates bound the punch period it covers.
 */
export interface MonthlyHoursSetting {
  month: number;
  maxHours: number;
  startDate: string;
  endDate: string;
}

export interface StoredMonthlyHoursLimit {
  month: number;
  maxHours: number;
  startDate: string | null;
  endDate: string | null;
}

export interface MonthlyHoursUpdate {
  month: number;
  maxHours: number;
  startDate?: string | null;
  endDate?: string | null;
}

export interface MonthlyHoursYear {
  year: number;
  months: MonthlyHoursSetting[];
}

export interface MonthlyHoursStore {
  findByYear(year: number): Promise<StoredMonthlyHoursLimit[]>;
  upsert(year: number, updates: MonthlyHoursUpdate[]): Promise<void>;
}
