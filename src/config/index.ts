export { env } from './env';
export {
  loadScoringConfig,
  parseScoringConfig,
  DEFAULT_SCORING_CONFIG_PATH,
} from './scoringConfig';
export type { ScoringConfig, RawScoringConfig } from './scoringConfig';
