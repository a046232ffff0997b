import type { PluginConfig } from '../config/index.js';
import { INSTALL_HINTS } from '../shared/constants.js';
import type { PluginIO } from '../shared/types.js';
import { writeLines } from '../utils/output.js';
import type { Logger } from '../utils/logger.js';
import type { NotifierResult, NotifierRunner } from '../utils/notify.js';
import { countColourLines, type ComposedNotification } from './composer.js';

export interface NotifierCommand {
  binary: string;
  args: string[];
}

export interface DispatchOptions {
  io: PluginIO;
  runner: NotifierRunner;
  binary: string;
  dryRun: boolean;
  logger?: Logger;
}

/**
 * Build the notifier invocation:
 *   <binary> [-a app] [-i icon] -u <urgency> -t <timeout> <title> <body>
 */
export function buildNotifierCommand(
  notification: ComposedNotification,
  config: PluginConfig,
  binary: string,
): NotifierCommand {
  const appArgs = config.appName ? ['-a', config.appName] : [];
  const iconArgs = config.icon ? ['-i', config.icon] : [];

  return {
    binary,
    args: [
      ...appArgs,
      ...iconArgs,
      '-u', config.urgency,
      '-t', String(config.timeout),
      notification.title,
      notification.body,
    ],
  };
}

/**
 * Space-joined command for display. Not quoted; not meant to be pasted into
 * a shell.
 */
export function formatCommand(command: NotifierCommand): string {
  return [command.binary, ...command.args].join(' ');
}

export function formatDryRun(
  command: NotifierCommand,
  notification: ComposedNotification,
  config: PluginConfig,
): string[] {
  return [
    '=== DRY-RUN MODE ===',
    'Would send notification with command:',
    `  ${formatCommand(command)}`,
    '',
    `Title: ${notification.title}`,
    'Body:',
    notification.body,
    '',
    'Settings:',
    `  Urgency: ${config.urgency}`,
    `  Timeout: ${config.timeout}ms`,
    `  App Name: ${config.appName}`,
    `  Icon: ${config.icon}`,
    '===================',
  ];
}

/**
 * Print the outcome of a notifier run and return the exit code.
 */
export function reportResult(
  result: NotifierResult,
  command: NotifierCommand,
  notification: ComposedNotification,
  config: PluginConfig,
  io: PluginIO,
): number {
  switch (result.kind) {
    case 'success':
      writeLines(io.stdout, '✓ Notification sent successfully');
      if (config.verbose) {
        writeLines(
          io.stdout,
          `  Command: ${formatCommand(command)}`,
          `  Title: ${notification.title}`,
          `  Icon: ${config.icon}`,
          `  Colours shown: ${countColourLines(notification)}`,
        );
      }
      return 0;

    case 'process-failure':
      writeLines(io.stderr, `✗ Error: Failed to send notification: ${result.reason}`);
      if (result.stderr) {
        writeLines(io.stderr, `  stderr: ${result.stderr}`);
      }
      return 1;

    case 'binary-not-found':
      writeLines(
        io.stderr,
        `✗ Error: ${result.binary} command not found. Please install libnotify.`,
        ...INSTALL_HINTS.map((hint) => `  ${hint}`),
      );
      return 1;
  }
}

/**
 * Send (or, in dry-run mode, describe) the notification. Returns the
 * process exit code.
 */
export async function dispatchNotification(
  notification: ComposedNotification,
  config: PluginConfig,
  options: DispatchOptions,
): Promise<number> {
  const { io, runner, binary, dryRun, logger } = options;
  const command = buildNotifierCommand(notification, config, binary);

  if (dryRun) {
    writeLines(io.stdout, ...formatDryRun(command, notification, config));
    return 0;
  }

  logger?.verbose(`Running ${binary} with ${command.args.length} arguments`);
  const result = await runner(command.binary, command.args);
  logger?.debug(`Notifier finished: ${result.kind}`);

  return reportResult(result, command, notification, config, io);
}
