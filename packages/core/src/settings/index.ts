export {
  EngineSettingsSchema,
  WatchclockSettingsSchema,
  SETTINGS_ENV,
  loadSettings,
  resolveSettings,
} from './settings.js';
export type { EngineSettings, WatchclockSettings, SettingsInput } from './settings.js';
