export * from './scoring';
export { createScoringSession } from './session';
export type { ScoringSession, ScoringSessionOptions } from './session';
export { loadScoringConfig, parseScoringConfig, DEFAULT_SCORING_CONFIG_PATH } from './config';
export type { ScoringConfig, RawScoringConfig } from './config';
export { AppError, Logging } from './utils';
export type { AppErrorCode } from './utils';
