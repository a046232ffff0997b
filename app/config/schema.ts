import { z } from 'zod';
import { LOG_LEVEL_NAMES } from '../utils/logger.js';
import {
  DEFAULT_APP_NAME,
  DEFAULT_ICON,
  DEFAULT_LOG_LEVEL,
  DEFAULT_NOTIFIER_BINARY,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_URGENCY,
} from './defaults.js';

/**
 * JSON truthiness: false, 0, "", null, [] and {} are off, anything else is on.
 */
export function isTruthy(value: unknown): boolean {
  if (Array.isArray(value)) return value.length > 0;
  if (typeof value === 'object' && value !== null) return Object.keys(value).length > 0;
  return Boolean(value);
}

/**
 * An on/off switch read by truthiness; `fallback` applies only when absent.
 */
export const flagSchema = (fallback: boolean) =>
  z.unknown().transform((value) => (value === undefined ? fallback : isTruthy(value)));

/**
 * Zod schema for the `plugin_args` object handed over by the host.
 *
 * Keys outside this schema are stripped. Switches are read by truthiness; any
 * other recognised key carrying a value of the wrong type falls back to its
 * default instead of failing the run.
 */
export const pluginArgsSchema = z
  .object({
    urgency: z.string().catch(DEFAULT_URGENCY),
    timeout: z.number().int().catch(DEFAULT_TIMEOUT_MS),
    title_prefix: z.string().catch(''),
    title: z.string().optional().catch(undefined),
    message: z.string().optional().catch(undefined),
    show_hex: flagSchema(true),
    show_count: flagSchema(true),
    app_name: z.string().catch(DEFAULT_APP_NAME),
    icon: z.string().catch(DEFAULT_ICON),
    verbose: flagSchema(false),
  })
  .transform((args) => ({
    urgency: args.urgency,
    timeout: args.timeout,
    titlePrefix: args.title_prefix,
    title: args.title,
    message: args.message,
    showHex: args.show_hex,
    showCount: args.show_count,
    appName: args.app_name,
    icon: args.icon,
    verbose: args.verbose,
  }));

/**
 * Process environment the plugin reads.
 */
export const envSettingsSchema = z
  .object({
    LOG_LEVEL: z.enum(LOG_LEVEL_NAMES).catch(DEFAULT_LOG_LEVEL),
    TINCT_NOTIFY_SEND_BIN: z
      .string()
      .trim()
      .min(1)
      .catch(DEFAULT_NOTIFIER_BINARY),
  })
  .transform((env) => ({
    logLevel: env.LOG_LEVEL,
    notifierBinary: env.TINCT_NOTIFY_SEND_BIN,
  }));

export type PluginConfig = z.infer<typeof pluginArgsSchema>;
export type EnvSettings = z.infer<typeof envSettingsSchema>;
