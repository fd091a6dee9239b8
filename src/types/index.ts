// Environment configuration type
export interface EnvConfig {
  NODE_ENV: 'development' | 'production' | 'test';
  LOG_LEVEL: 'error' | 'warn' | 'info' | 'http' | 'debug' | 'silent';
  /** Optional override for the scoring configuration file */
  SCORING_CONFIG_PATH?: string;
}
