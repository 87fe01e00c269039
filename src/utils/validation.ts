import Joi from 'joi';
import { MonthlyHoursUpdate } from '../models/MonthlyHours';
import { ValidationError } from './errors';

export interface LoginBody {
  username: string;
  password: string;
  domain?: string;
  next?: string;
}

export interface DashboardQuery {
  year: number;
  month?: number;
  program?: string;
}

export interface HomeQuery {
  year: number;
  month: number;
}

export interface PeopleSearchQuery {
  q: string;
}

export interface MonthlyHoursQuery {
  year: number;
}

export interface MonthlyHoursBody {
  year: number;
  months: MonthlyHoursUpdate[];
}

const yearSchema = Joi.number().integer().min(2000).max(2100);
const monthSchema = Joi.number().integer().min(1).max(12);

export const loginSchema = Joi.object<LoginBody>({
  username: Joi.string().trim().min(1).max(256).required(),
  password: Joi.string().min(1).max(1024).required(),
  domain: Joi.string().trim().pattern(/^[A-Za-z0-9.-]+$/).max(64).empty(''),
  next: Joi.string().max(2048).empty('')
});

export const dashboardQuerySchema = Joi.object<DashboardQuery>({
  year: yearSchema.default(() => new Date().getFullYear()),
  month: monthSchema.empty(''),
  program: Joi.string().trim().max(200).empty('')
});

export const homeQuerySchema = Joi.object<HomeQuery>({
  year: yearSchema.default(() => new Date().getFullYear()),
  month: monthSchema.default(() => new Date().getMonth() + 1)
});

export const peopleSearchQuerySchema = Joi.object<PeopleSearchQuery>({
  q: Joi.string().trim().max(100).allow('').default('')
});

export const monthlyHoursQuerySchema = Joi.object<MonthlyHoursQuery>({
  year: yearSchema.default(() => new Date().getFullYear())
});

const isoDaySchema = Joi.string().pattern(/^\d{4}-\d{2}-\d{2}$/).allow(null).empty('');

export const monthlyHoursBodySchema = Joi.object<MonthlyHoursBody>({
  year: yearSchema.required(),
  months: Joi.array()
    .items(
      Joi.object({
        month: monthSchema.required(),
        maxHours: Joi.number().positive().max(744).precision(2).required(),
        startDate: isoDaySchema,
        endDate: isoDaySchema
      })
    )
    .min(1)
    .max(12)
    .unique('month')
    .required()
});

/**
 * Validates and converts `data`, throwing a ValidationError listing every problem.
 */
export function validateAndThrow<T>(schema: Joi.ObjectSchema<T>, data: unknown): T {
  const { error, value } = schema.validate(data, { abortEarly: false, stripUnknown: true });
  if (error) {
    throw new ValidationError(
      'Validation failed',
      error.details.map(detail => ({ field: detail.path.join('.'), message: detail.message }))
    );
  }
  return value;
}

/**
 * A post-login redirect target, accepted only as a same-site absolute path.
 */
export function safeRedirectPath(next: string | undefined): string | null {
  if (!next || !next.startsWith('/')) {
    return null;
  }
  if (next.startsWith('//') || next.startsWith('/\\') || /[\r\n]/.test(next)) {
    return null;
  }
  return next;
}
