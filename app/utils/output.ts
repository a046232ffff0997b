import type { OutputStream } from '../shared/types.js';

/**
 * Write each line followed by a newline, in a single write.
 */
export function writeLines(stream: OutputStream, ...lines: string[]): void {
  stream.write(lines.map((line) => `${line}\n`).join(''));
}
