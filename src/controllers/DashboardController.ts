import { Request, Response, NextFunction } from 'express';
import { principalOf } from '../middleware/authorization';
import { DashboardService } from '../services/DashboardService';
import { dashboardQuerySchema, homeQuerySchema, validateAndThrow } from '../utils/validation';

export class DashboardController {
  private readonly dashboardService: DashboardService;

  constructor(dashboardService: DashboardService) {
    this.dashboardService = dashboardService;
  }

  /**
   * GET /api/dashboard/home?year&month
   */
  public getHome = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const period = validateAndThrow(homeQuerySchema, req.query);
      res.json(await this.dashboardService.getHome(principalOf(req), period));
    } catch (error) {
      next(error);
    }
  };

  /**
   * GET /api/dashboard/filters
   */
  public getFilters = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      res.json(await this.dashboardService.getFilterOptions(principalOf(req)));
    } catch (error) {
      next(error);
    }
  };

  /**
   * GET /api/dashboard/team?year&month&program
   */
  public getTeam = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const filters = validateAndThrow(dashboardQuerySchema, req.query);
      res.json(await this.dashboardService.getTeamDashboard(principalOf(req), filters));
    } catch (error) {
      next(error);
    }
  };

  /**
   * GET /api/dashboard/programs?year&month
   */
  public getPrograms = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { year, month } = validateAndThrow(dashboardQuerySchema, req.query);
      res.json(await this.dashboardService.getProgramBreakdown(principalOf(req), { year, month }));
    } catch (error) {
      next(error);
    }
  };
}
