import { Command } from 'commander';
import { runNotify } from './commands/notify.js';
import { showPluginInfo } from './commands/plugin-info.js';
import { loadEnvSettings, type EnvSettings } from './config/index.js';
import { PLUGIN_NAME, PLUGIN_VERSION } from './shared/constants.js';
import type { PluginIO } from './shared/types.js';
import { Logger } from './utils/logger.js';
import type { NotifierRunner } from './utils/notify.js';

export interface ProgramDeps {
  io: PluginIO;
  settings?: EnvSettings;
  runner?: NotifierRunner;
  /** Receives the exit code; defaults to setting `process.exitCode`. */
  setExitCode?: (code: number) => void;
}

export function createProgram(deps: ProgramDeps): Command {
  const settings = deps.settings ?? loadEnvSettings();
  const setExitCode = deps.setExitCode ?? ((code: number) => { process.exitCode = code; });
  const logger = new Logger({ level: settings.logLevel, prefix: `[${PLUGIN_NAME}]` });

  const program = new Command();

  program
    .name(`tinct-plugin-${PLUGIN_NAME}`)
    .description('Tinct output plugin - desktop notification with the extracted palette')
    .version(PLUGIN_VERSION)
    .option('--plugin-info', 'Print plugin metadata as JSON and exit')
    .allowUnknownOption()
    .allowExcessArguments()
    .action(async (options: { pluginInfo?: boolean }) => {
      if (options.pluginInfo) {
        setExitCode(showPluginInfo(deps.io.stdout));
        return;
      }

      const code = await runNotify({
        io: deps.io,
        runner: deps.runner,
        binary: settings.notifierBinary,
        logger,
      });
      setExitCode(code);
    });

  return program;
}
