export {
  loadResolutionSettings,
  validateResolutionSettings,
  resolutionSettingsSchema,
  SETTINGS_ENV_VARS,
  type ResolutionSettings,
  type SettingsOverrides,
} from './resolution-settings.js';
