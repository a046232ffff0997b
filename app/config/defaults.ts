import type { LogLevel } from '../utils/logger.js';
import type { EnvSettings, PluginConfig } from './schema.js';

/**
 * Default configuration values
 */
export const DEFAULT_URGENCY = 'normal';
export const DEFAULT_TIMEOUT_MS = 10000;
export const DEFAULT_APP_NAME = 'Tinct';
export const DEFAULT_ICON = 'preferences-desktop-theme';
export const DEFAULT_NOTIFIER_BINARY = 'notify-send';
export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

export const defaultPluginConfig: PluginConfig = {
  urgency: DEFAULT_URGENCY,
  timeout: DEFAULT_TIMEOUT_MS,
  titlePrefix: '',
  title: undefined,
  message: undefined,
  showHex: true,
  showCount: true,
  appName: DEFAULT_APP_NAME,
  icon: DEFAULT_ICON,
  verbose: false,
};

export const defaultEnvSettings: EnvSettings = {
  logLevel: DEFAULT_LOG_LEVEL,
  notifierBinary: DEFAULT_NOTIFIER_BINARY,
};
