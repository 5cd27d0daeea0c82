// Application Configuration
// Defaults shared by the prompt layer, model client and orchestration

export { defaultConfig, type AppConfig } from './defaults';
export {
  ModelSettingsSchema,
  type ModelSettings,
  type ModelSettingsInput,
  parseModelSettings,
  modelSettingsFromEnv,
} from './modelSettings';
