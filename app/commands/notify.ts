import { defaultEnvSettings, resolvePluginConfig } from '../config/index.js';
import { composeNotification } from '../notification/composer.js';
import { dispatchNotification } from '../notification/invoker.js';
import { PaletteInputError, readPalette } from '../palette/input.js';
import type { Palette } from '../palette/types.js';
import { PLUGIN_VERSION } from '../shared/constants.js';
import type { PluginIO } from '../shared/types.js';
import { Logger } from '../utils/logger.js';
import { execNotifier, type NotifierRunner } from '../utils/notify.js';
import { writeLines } from '../utils/output.js';

export interface NotifyDeps {
  io: PluginIO;
  runner?: NotifierRunner;
  binary?: string;
  logger?: Logger;
}

const RULE = '='.repeat(50);

function writeBanner(io: PluginIO, palette: Palette): void {
  const args = Object.keys(palette.pluginArgs).length > 0
    ? JSON.stringify(palette.pluginArgs, null, 2)
    : 'none';

  writeLines(
    io.stdout,
    '',
    RULE,
    `Tinct Notify-Send Plugin v${PLUGIN_VERSION}`,
    RULE,
    `Dry-run mode: ${palette.dryRun}`,
    `Plugin args: ${args}`,
    RULE,
    '',
  );
}

/**
 * Read a palette from stdin, compose the notification and dispatch it.
 * Returns the process exit code.
 */
export async function runNotify(deps: NotifyDeps): Promise<number> {
  const { io } = deps;
  const runner = deps.runner ?? execNotifier;
  const binary = deps.binary ?? defaultEnvSettings.notifierBinary;
  const logger = deps.logger ?? new Logger({ prefix: '[notify]' });

  let palette: Palette;
  try {
    palette = await readPalette(io.stdin);
  } catch (error) {
    if (error instanceof PaletteInputError) {
      logger.debug(`Rejected input (${error.kind})`);
      writeLines(io.stderr, `Error: ${error.message}`);
      return 1;
    }
    throw error;
  }

  const config = resolvePluginConfig(palette.pluginArgs);
  logger.debug('Resolved plugin config:', config);

  if (config.verbose || palette.dryRun) {
    writeBanner(io, palette);
  }

  const notification = composeNotification(palette, config);

  return dispatchNotification(notification, config, {
    io,
    runner,
    binary,
    dryRun: palette.dryRun,
    logger,
  });
}
