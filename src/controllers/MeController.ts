import { Request, Response } from 'express';
import { toPublicIdentity } from '../models/Identity';
import { roleDisplayNames } from '../models/Role';
import { principalOf } from '../middleware/authorization';
import { buildMenu } from '../services/MenuBuilder';

export class MeController {
  /**
   * GET /api/me
   */
  public getCurrentUser = (req: Request, res: Response): void => {
    const principal = principalOf(req);

    res.json({
      identity: toPublicIdentity(principal.identity),
      role: principal.role,
      roleName: roleDisplayNames[principal.role],
      authenticatedAt: principal.authenticatedAt,
      menu: buildMenu(principal.role)
    });
  };
}
