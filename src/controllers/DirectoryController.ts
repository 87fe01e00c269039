import { Request, Response, NextFunction } from 'express';
import { toPublicIdentity } from '../models/Identity';
import { principalOf } from '../middleware/authorization';
import { DirectoryService } from '../services/DirectoryService';
import { logger } from '../utils/logger';
import { peopleSearchQuerySchema, validateAndThrow } from '../utils/validation';

export class DirectoryController {
  private readonly directory: DirectoryService;

  constructor(directory: DirectoryService) {
    this.directory = directory;
  }

  /**
   * GET /api/directory/reportees
   * Direct reports of the signed-in user, looked up with their own credential.
   */
  public getReportees = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { identity, directoryCredential } = principalOf(req);

      // Superadmin sessions hold no directory credential
      if (!directoryCredential) {
        res.json({ reportees: [] });
        return;
      }

      const reportees = await this.directory.fetchReportees(identity.distinguishedName, directoryCredential);

      logger.info('Reportees retrieved', { username: identity.username, count: reportees.length });
      res.json({ reportees: reportees.map(toPublicIdentity) });
    } catch (error) {
      next(error);
    }
  };

  /**
   * GET /api/directory/search?q=
   */
  public searchPeople = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { q } = validateAndThrow(peopleSearchQuerySchema, req.query);
      const { directoryCredential } = principalOf(req);

      if (!directoryCredential) {
        res.json({ query: q, results: [] });
        return;
      }

      const results = await this.directory.searchPeople(q, directoryCredential);
      res.json({ query: q, results: results.map(toPublicIdentity) });
    } catch (error) {
      next(error);
    }
  };
}
