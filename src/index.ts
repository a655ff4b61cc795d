export * from './types/article';
export * from './config/environment';
export * from './utils/errors';
export { logger, isLogLevel, type LogLevel } from './utils/logger';
export * from './pipeline/tools/cleaning-helpers';
export * from './pipeline/tools/io-helpers';
export * from './pipeline/validation/rules';
export * from './pipeline/validation/engine';
export * from './pipeline/report/quality-report';
export * from './pipeline/cleaning-pipeline';
