import { z } from 'zod';
import { ROLES, Role } from './Role';

export interface MenuSection {
  key: string;
  title: string;
  icon: string;
  path?: string;
  minRole: Role;
  children?: MenuSection[];
}

const menuSectionSchema: z.ZodType<MenuSection> = z.lazy(() =>
  z.object({
    key: z.string().min(1),
    title: z.string().min(1),
    icon: z.string().min(1),
    path: z.string().startsWith('/').optional(),
    minRole: z.enum(ROLES),
    children: z.array(menuSectionSchema).optional()
  })
);

export const menuTreeSchema = z
  .array(menuSectionSchema)
  .superRefine((sections, ctx) => {
    const seen = new Set<string>();
    const visit = (items: MenuSection[]): void => {
      for (const item of items) {
        if (seen.has(item.key)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate menu key "${item.key}"` });
        }
        seen.add(item.key);
        if (item.children) {
          visit(item.children);
        }
      }
    };
    visit(sections);
  });

export interface PageRoute {
  key: string;
  title: string;
  path: string;
  minRole: Role;
}
