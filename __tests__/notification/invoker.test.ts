import { jest } from '@jest/globals';
import { resolvePluginConfig } from '../../app/config/index.js';
import type { ComposedNotification } from '../../app/notification/composer.js';
import {
  buildNotifierCommand,
  dispatchNotification,
  formatCommand,
} from '../../app/notification/invoker.js';
import { Logger } from '../../app/utils/logger.js';
import type { NotifierRunner } from '../../app/utils/notify.js';
import { CapturedStream, createTestIO } from '../helpers/io.js';

const notification: ComposedNotification = {
  title: 'Tinct Colour Palette (Dark Theme)',
  body: '  Background: #101010\n\nTotal colours extracted: 4',
  lines: ['  Background: #101010', '\nTotal colours extracted: 4'],
};

function successRunner() {
  return jest.fn<NotifierRunner>().mockResolvedValue({ kind: 'success', stdout: '', stderr: '' });
}

describe('Notifier Invoker', () => {
  describe('buildNotifierCommand', () => {
    it('builds the full argument list with defaults', () => {
      const command = buildNotifierCommand(notification, resolvePluginConfig({}), 'notify-send');

      expect(command).toEqual({
        binary: 'notify-send',
        args: [
          '-a', 'Tinct',
          '-i', 'preferences-desktop-theme',
          '-u', 'normal',
          '-t', '10000',
          'Tinct Colour Palette (Dark Theme)',
          '  Background: #101010\n\nTotal colours extracted: 4',
        ],
      });
    });

    it('omits app name and icon when they are empty', () => {
      const config = resolvePluginConfig({ app_name: '', icon: '', urgency: 'critical', timeout: 5000 });
      const command = buildNotifierCommand(notification, config, 'notify-send');

      expect(command.args).toEqual([
        '-u', 'critical',
        '-t', '5000',
        notification.title,
        notification.body,
      ]);
    });

    it('passes urgency through without validating it', () => {
      const command = buildNotifierCommand(
        notification,
        resolvePluginConfig({ urgency: 'whenever' }),
        'notify-send',
      );
      expect(command.args.slice(4, 6)).toEqual(['-u', 'whenever']);
    });
  });

  describe('formatCommand', () => {
    it('joins binary and arguments with spaces', () => {
      expect(formatCommand({ binary: 'notify-send', args: ['-u', 'low', 'Hi', 'there'] })).toBe(
        'notify-send -u low Hi there',
      );
    });
  });

  describe('dispatchNotification', () => {
    it('prints the dry-run report without running anything', async () => {
      const io = createTestIO('');
      const runner = successRunner();

      const code = await dispatchNotification(notification, resolvePluginConfig({}), {
        io,
        runner,
        binary: 'notify-send',
        dryRun: true,
      });

      expect(code).toBe(0);
      expect(runner).not.toHaveBeenCalled();
      expect(io.stderr.text).toBe('');
      expect(io.stdout.text).toBe(
        [
          '=== DRY-RUN MODE ===',
          'Would send notification with command:',
          '  notify-send -a Tinct -i preferences-desktop-theme -u normal -t 10000 ' +
            'Tinct Colour Palette (Dark Theme)   Background: #101010\n\nTotal colours extracted: 4',
          '',
          'Title: Tinct Colour Palette (Dark Theme)',
          'Body:',
          '  Background: #101010\n\nTotal colours extracted: 4',
          '',
          'Settings:',
          '  Urgency: normal',
          '  Timeout: 10000ms',
          '  App Name: Tinct',
          '  Icon: preferences-desktop-theme',
          '===================',
        ].join('\n') + '\n',
      );
    });

    it('runs the notifier and confirms success', async () => {
      const io = createTestIO('');
      const runner = successRunner();
      const config = resolvePluginConfig({});

      const code = await dispatchNotification(notification, config, {
        io,
        runner,
        binary: 'notify-send',
        dryRun: false,
      });

      expect(code).toBe(0);
      expect(runner).toHaveBeenCalledTimes(1);
      expect(runner).toHaveBeenCalledWith(
        'notify-send',
        buildNotifierCommand(notification, config, 'notify-send').args,
      );
      expect(io.stdout.text).toBe('✓ Notification sent successfully\n');
    });

    it('logs the notifier launch at verbose level', async () => {
      const sink = new CapturedStream();
      const logger = new Logger({ level: 'verbose', timestamps: false, sink });

      await dispatchNotification(notification, resolvePluginConfig({}), {
        io: createTestIO(''),
        runner: successRunner(),
        binary: 'notify-send',
        dryRun: false,
        logger,
      });

      expect(sink.text).toBe('[VERBOSE] Running notify-send with 10 arguments\n');
    });

    it('echoes details after success when verbose', async () => {
      const io = createTestIO('');

      await dispatchNotification(notification, resolvePluginConfig({ verbose: true, icon: 'palette' }), {
        io,
        runner: successRunner(),
        binary: 'notify-send',
        dryRun: false,
      });

      expect(io.stdout.text).toBe(
        [
          '✓ Notification sent successfully',
          '  Command: notify-send -a Tinct -i palette -u normal -t 10000 ' +
            'Tinct Colour Palette (Dark Theme)   Background: #101010\n\nTotal colours extracted: 4',
          '  Title: Tinct Colour Palette (Dark Theme)',
          '  Icon: palette',
          '  Colours shown: 2',
        ].join('\n') + '\n',
      );
    });

    it('reports a failing notifier with its stderr', async () => {
      const io = createTestIO('');
      const runner = jest.fn<NotifierRunner>().mockResolvedValue({
        kind: 'process-failure',
        reason: 'notify-send exited with code 1',
        exitCode: 1,
        signal: null,
        stdout: '',
        stderr: 'Unknown urgency whenever specified.',
      });

      const code = await dispatchNotification(notification, resolvePluginConfig({}), {
        io,
        runner,
        binary: 'notify-send',
        dryRun: false,
      });

      expect(code).toBe(1);
      expect(io.stdout.text).toBe('');
      expect(io.stderr.text).toBe(
        '✗ Error: Failed to send notification: notify-send exited with code 1\n' +
          '  stderr: Unknown urgency whenever specified.\n',
      );
    });

    it('leaves out the stderr line when the notifier printed nothing', async () => {
      const io = createTestIO('');
      const runner = jest.fn<NotifierRunner>().mockResolvedValue({
        kind: 'process-failure',
        reason: 'notify-send terminated by signal SIGTERM',
        exitCode: null,
        signal: 'SIGTERM',
        stdout: '',
        stderr: '',
      });

      const code = await dispatchNotification(notification, resolvePluginConfig({}), {
        io,
        runner,
        binary: 'notify-send',
        dryRun: false,
      });

      expect(code).toBe(1);
      expect(io.stderr.text).toBe(
        '✗ Error: Failed to send notification: notify-send terminated by signal SIGTERM\n',
      );
    });

    it('prints install guidance when the binary is missing', async () => {
      const io = createTestIO('');
      const runner = jest.fn<NotifierRunner>().mockResolvedValue({
        kind: 'binary-not-found',
        binary: 'notify-send',
      });

      const code = await dispatchNotification(notification, resolvePluginConfig({}), {
        io,
        runner,
        binary: 'notify-send',
        dryRun: false,
      });

      expect(code).toBe(1);
      expect(io.stderr.text).toBe(
        [
          '✗ Error: notify-send command not found. Please install libnotify.',
          '  Ubuntu/Debian: sudo apt-get install libnotify-bin',
          '  Arch: sudo pacman -S libnotify',
          '  Fedora: sudo dnf install libnotify',
        ].join('\n') + '\n',
      );
    });
  });
});
