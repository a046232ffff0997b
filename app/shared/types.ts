/**
 * Shared types for the notify-send plugin
 */

export interface OutputStream {
  write(chunk: string): unknown;
}

/**
 * The process streams a run talks to. Injected so commands can be driven
 * from tests without touching the real stdio.
 */
export interface PluginIO {
  stdin: AsyncIterable<string | Buffer>;
  stdout: OutputStream;
  stderr: OutputStream;
}
