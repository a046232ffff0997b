import { envSettingsSchema, pluginArgsSchema, type EnvSettings, type PluginConfig } from './schema.js';

export type { EnvSettings, PluginConfig } from './schema.js';
export { defaultEnvSettings, defaultPluginConfig } from './defaults.js';

/**
 * Resolve the plugin configuration from the raw `plugin_args` mapping.
 * Never throws: unknown keys are dropped and bad values take their defaults.
 */
export function resolvePluginConfig(pluginArgs: Record<string, unknown>): PluginConfig {
  return pluginArgsSchema.parse(pluginArgs);
}

/**
 * Load environment-driven settings (log level, notifier binary).
 */
export function loadEnvSettings(env: NodeJS.ProcessEnv = process.env): EnvSettings {
  return envSettingsSchema.parse(env);
}
