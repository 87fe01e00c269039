export { createApp, AppDependencies } from './app';
export { loadConfig, usesDefaultSuperadmin, AppConfig, ConfigurationError } from './config';
export { DatabaseConnection, QueryExecutor } from './database/connection';
export { RedisConnection } from './database/redis';
export { AllocationRepository } from './database/repositories/AllocationRepository';
export { MonthlyHoursRepository } from './database/repositories/MonthlyHoursRepository';
export * from './models/Allocation';
export * from './models/Identity';
export * from './models/Menu';
export * from './models/MonthlyHours';
export * from './models/Role';
export * from './models/Session';
export { AuthService, LoginOutcome, LoginRequest } from './services/AuthService';
export { checkAccess, DenialReason, GateDecision } from './services/AuthorizationGate';
export { DashboardService } from './services/DashboardService';
export { DirectoryService, DirectoryConnection, DirectoryConnectionFactory } from './services/DirectoryService';
export { MonthlyHoursService } from './services/MonthlyHoursService';
export { buildMenu, listPageRoutes, MENU_SECTIONS } from './services/MenuBuilder';
export { RoleResolver, RoleResolution, RoleRule, DEFAULT_ROLE_RULES } from './services/RoleResolver';
export { logger } from './utils/logger';
