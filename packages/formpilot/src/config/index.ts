export { getEnv, resetEnv, type Env } from './env';
export {
  resolveEngineConfig,
  EngineConfigSchema,
  DEFAULT_SCORE_FLOORS,
  type EngineConfig,
  type EngineConfigInput,
} from './matching';
