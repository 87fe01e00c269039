import menuTree from '../config/menu.json';
import { MenuSection, PageRoute, menuTreeSchema } from '../models/Menu';
import { Role, satisfiesMinimumRole } from '../models/Role';

/**
 * Configured navigation tree, validated once at load.
 */
export const MENU_SECTIONS: readonly MenuSection[] = menuTreeSchema.parse(menuTree);

/**
 * Sections visible to `role`, in configured order. A parent the role can see
 * keeps only the children the role can see; an emptied child list is dropped,
 * along with the parent itself when it has no page of its own.
 * Pure: no directory or database access.
 */
export function buildMenu(role: Role, sections: readonly MenuSection[] = MENU_SECTIONS): MenuSection[] {
  const visible: MenuSection[] = [];

  for (const section of sections) {
    if (!satisfiesMinimumRole(role, section.minRole)) {
      continue;
    }

    const { children, ...rest } = section;
    const item: MenuSection = { ...rest };

    if (children) {
      const visibleChildren = buildMenu(role, children);
      if (visibleChildren.length > 0) {
        item.children = visibleChildren;
      } else if (!item.path) {
        // A pure group with nothing left in it
        continue;
      }
    }

    visible.push(item);
  }

  return visible;
}

/**
 * Every section with a path, flattened. A child inherits the stricter of its
 * own and its parent's minimum role.
 */
export function listPageRoutes(sections: readonly MenuSection[] = MENU_SECTIONS): PageRoute[] {
  const routes: PageRoute[] = [];

  const visit = (items: readonly MenuSection[], inherited: Role): void => {
    for (const item of items) {
      const minRole = satisfiesMinimumRole(item.minRole, inherited) ? item.minRole : inherited;
      if (item.path) {
        routes.push({ key: item.key, title: item.title, path: item.path, minRole });
      }
      if (item.children) {
        visit(item.children, minRole);
      }
    }
  };

  visit(sections, 'EMPLOYEE');
  return routes;
}
