import { Request, Response, RequestHandler } from 'express';
import { toPublicIdentity } from '../models/Identity';
import { PageRoute } from '../models/Menu';
import { roleDisplayNames } from '../models/Role';
import { principalOf } from '../middleware/authorization';
import { buildMenu } from '../services/MenuBuilder';

export class PageController {
  /**
   * View model for a navigable page. The client renders it; data comes from /api.
   */
  public render(route: PageRoute): RequestHandler {
    return (req: Request, res: Response): void => {
      const principal = principalOf(req);

      res.json({
        page: route.key,
        title: route.title,
        user: {
          ...toPublicIdentity(principal.identity),
          role: principal.role,
          roleName: roleDisplayNames[principal.role]
        },
        menu: buildMenu(principal.role)
      });
    };
  }
}
