import { z } from 'zod';

const DEFAULT_ATTRIBUTES = [
  'cn',
  'sAMAccountName',
  'userPrincipalName',
  'mail',
  'department',
  'title',
  'memberOf',
  'manager'
];

const commaList = (fallback: string[] = []) =>
  z
    .string()
    .optional()
    .transform(value =>
      value === undefined
        ? fallback
        : value.split(',').map(item => item.trim()).filter(item => item.length > 0)
    );

const booleanFlag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform(value => (value === undefined ? fallback : value === 'true'));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  ALLOWED_ORIGINS: commaList(['http://localhost:3000']),

  LDAP_SERVER: z.string().optional(),
  LDAP_PORT: z.coerce.number().int().positive().default(389),
  LDAP_USE_TLS: booleanFlag(false),
  LDAP_BASE_DN: z.string().optional(),
  LDAP_USER_SEARCH_BASE: z.string().optional(),
  LDAP_DOMAIN_PREFIX: z.string().optional(),
  LDAP_ATTRIBUTES: commaList(DEFAULT_ATTRIBUTES),
  LDAP_ADMIN_GROUPS: commaList(),
  LDAP_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  LDAP_CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),

  SUPERADMIN_ENABLED: booleanFlag(true),
  SUPERADMIN_USERNAME: z.string().min(1).default('admin'),
  SUPERADMIN_PASSWORD: z.string().min(1).default('admin'),

  SESSION_SECRET: z.string().min(1).optional(),
  SESSION_TTL_SECONDS: z.coerce.number().int().positive().default(60 * 60 * 8),
  SESSION_COOKIE_NAME: z.string().min(1).default('allocation.sid'),

  REDIS_URL: z.string().optional(),
  REDIS_HOST: z.string().default('localhost'),
  REDIS_PORT: z.coerce.number().int().positive().default(6379),
  REDIS_PASSWORD: z.string().optional(),

  DB_HOST: z.string().default('localhost'),
  DB_PORT: z.coerce.number().int().positive().default(5432),
  DB_NAME: z.string().default('resource_allocation'),
  DB_USER: z.string().default('postgres'),
  DB_PASSWORD: z.string().default('password'),
  DB_SSL: booleanFlag(false),

  HOURS_PER_FTE_MONTH: z.coerce.number().positive().default(183.75),
  LOGIN_RATE_LIMIT_MAX: z.coerce.number().int().positive().default(10)
});

export interface DirectoryConfig {
  url: string | null;
  baseDn: string | null;
  userSearchBase: string | null;
  domainPrefix: string | null;
  attributes: string[];
  adminGroups: string[];
  timeoutMs: number;
  connectTimeoutMs: number;
}

export interface SuperadminConfig {
  enabled: boolean;
  username: string;
  password: string;
}

export interface SessionConfig {
  secret: string;
  ttlSeconds: number;
  cookieName: string;
  secureCookie: boolean;
}

export interface AppConfig {
  env: 'development' | 'test' | 'production';
  port: number;
  allowedOrigins: string[];
  directory: DirectoryConfig;
  superadmin: SuperadminConfig;
  session: SessionConfig;
  redis: { url: string; password?: string };
  database: {
    host: string;
    port: number;
    database: string;
    user: string;
    password: string;
    ssl: boolean;
  };
  hoursPerFteMonth: number;
  loginRateLimitMax: number;
}

const DEVELOPMENT_SESSION_SECRET = 'development-session-secret';

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Builds the application configuration from environment variables.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`);
  }

  const vars = parsed.data;
  const isProduction = vars.NODE_ENV === 'production';

  if (isProduction && !vars.SESSION_SECRET) {
    throw new ConfigurationError('SESSION_SECRET must be configured in production environment');
  }

  const scheme = vars.LDAP_USE_TLS ? 'ldaps' : 'ldap';

  return {
    env: vars.NODE_ENV,
    port: vars.PORT,
    allowedOrigins: vars.ALLOWED_ORIGINS,
    directory: {
      url: vars.LDAP_SERVER ? `${scheme}://${vars.LDAP_SERVER}:${vars.LDAP_PORT}` : null,
      baseDn: vars.LDAP_BASE_DN || null,
      userSearchBase: vars.LDAP_USER_SEARCH_BASE || null,
      domainPrefix: vars.LDAP_DOMAIN_PREFIX || null,
      attributes: vars.LDAP_ATTRIBUTES,
      adminGroups: vars.LDAP_ADMIN_GROUPS,
      timeoutMs: vars.LDAP_TIMEOUT_MS,
      connectTimeoutMs: vars.LDAP_CONNECT_TIMEOUT_MS
    },
    superadmin: {
      enabled: vars.SUPERADMIN_ENABLED,
      username: vars.SUPERADMIN_USERNAME,
      password: vars.SUPERADMIN_PASSWORD
    },
    session: {
      secret: vars.SESSION_SECRET || DEVELOPMENT_SESSION_SECRET,
      ttlSeconds: vars.SESSION_TTL_SECONDS,
      cookieName: vars.SESSION_COOKIE_NAME,
      secureCookie: isProduction
    },
    redis: {
      url: vars.REDIS_URL || `redis://${vars.REDIS_HOST}:${vars.REDIS_PORT}`,
      password: vars.REDIS_PASSWORD
    },
    database: {
      host: vars.DB_HOST,
      port: vars.DB_PORT,
      database: vars.DB_NAME,
      user: vars.DB_USER,
      password: vars.DB_PASSWORD,
      ssl: vars.DB_SSL
    },
    hoursPerFteMonth: vars.HOURS_PER_FTE_MONTH,
    loginRateLimitMax: vars.LOGIN_RATE_LIMIT_MAX
  };
}

/**
 * True when the superadmin bypass still uses the shipped credentials.
 */
export function usesDefaultSuperadmin(config: AppConfig): boolean {
  return config.superadmin.enabled &&
    config.superadmin.username === 'admin' &&
    config.superadmin.password === 'admin';
}
