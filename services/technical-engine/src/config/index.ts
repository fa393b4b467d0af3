export * from './schema';
export {
  DEFAULT_ENGINE_CONFIG,
  configFromEnv,
  deepMerge,
  loadEngineConfig,
  parseTimeframeSets,
} from './ConfigLoader';
