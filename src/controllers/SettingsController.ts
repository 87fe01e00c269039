import { Request, Response, NextFunction } from 'express';
import { principalOf } from '../middleware/authorization';
import { MonthlyHoursService } from '../services/MonthlyHoursService';
import { monthlyHoursBodySchema, monthlyHoursQuerySchema, validateAndThrow } from '../utils/validation';

export class SettingsController {
  private readonly monthlyHours: MonthlyHoursService;

  constructor(monthlyHours: MonthlyHoursService) {
    this.monthlyHours = monthlyHours;
  }

  /**
   * GET /api/settings/monthly-hours?year
   * All twelve months, defaults filled in for months never saved.
   */
  public getMonthlyHours = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { year } = validateAndThrow(monthlyHoursQuerySchema, req.query);
      res.json(await this.monthlyHours.getYear(year));
    } catch (error) {
      next(error);
    }
  };

  /**
   * PUT /api/settings/monthly-hours
   */
  public saveMonthlyHours = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { identity } = principalOf(req);
      const { year, months } = validateAndThrow(monthlyHoursBodySchema, req.body);
      res.json(await this.monthlyHours.saveYear(year, months, identity.username));
    } catch (error) {
      next(error);
    }
  };
}
