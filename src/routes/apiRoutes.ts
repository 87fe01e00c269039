import { Router } from 'express';
import { DashboardController } from '../controllers/DashboardController';
import { DirectoryController } from '../controllers/DirectoryController';
import { MeController } from '../controllers/MeController';
import { SettingsController } from '../controllers/SettingsController';
import { requireApiAccess } from '../middleware/authorization';
import { PROGRAM_VIEW_ROLES, TEAM_VIEW_ROLES } from '../models/Role';

export interface ApiControllers {
  me: MeController;
  directory: DirectoryController;
  dashboard: DashboardController;
  settings: SettingsController;
}

export function createApiRoutes(controllers: ApiControllers): Router {
  const router = Router();
  const { me, directory, dashboard, settings } = controllers;

  // Any signed-in user
  router.get('/me', requireApiAccess(), me.getCurrentUser);
  router.get('/dashboard/home', requireApiAccess(), dashboard.getHome);

  // Team leads and above
  router.get('/directory/reportees', requireApiAccess(TEAM_VIEW_ROLES), directory.getReportees);
  router.get('/directory/search', requireApiAccess(TEAM_VIEW_ROLES), directory.searchPeople);
  router.get('/dashboard/filters', requireApiAccess(TEAM_VIEW_ROLES), dashboard.getFilters);
  router.get('/dashboard/team', requireApiAccess(TEAM_VIEW_ROLES), dashboard.getTeam);

  // Program leads and administrators
  router.get('/dashboard/programs', requireApiAccess(PROGRAM_VIEW_ROLES), dashboard.getPrograms);
  router.get('/settings/monthly-hours', requireApiAccess(PROGRAM_VIEW_ROLES), settings.getMonthlyHours);
  router.put('/settings/monthly-hours', requireApiAccess(PROGRAM_VIEW_ROLES), settings.saveMonthlyHours);

  return router;
}
