export { default as logger, Logging } from './logger';
export { AppError } from './AppError';
export type { AppErrorCode } from './AppError';
