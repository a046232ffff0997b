import { paletteSchema, type Palette } from './types.js';

export type PaletteInputErrorKind = 'read' | 'parse' | 'format' | 'missing-field';

/**
 * Structurally invalid input. Always fatal for the run.
 */
export class PaletteInputError extends Error {
  readonly kind: PaletteInputErrorKind;

  constructor(kind: PaletteInputErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PaletteInputError';
    this.kind = kind;
  }
}

/**
 * Drain a stream (normally stdin) into a UTF-8 string.
 */
export async function readStream(stream: AsyncIterable<string | Buffer>): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk);
  }
  return Buffer.concat(chunks).toString('utf-8');
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse and validate a palette document.
 *
 * Rejects malformed JSON, a non-object top level, and documents with neither
 * `colours` nor `all_colours`. `{"colours": {}}` is valid: sparse content is
 * the composer's business, not an input error.
 */
export function parsePalette(text: string): Palette {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new PaletteInputError('parse', `Failed to parse JSON input: ${reason}`, { cause: error });
  }

  if (!isPlainObject(data)) {
    throw new PaletteInputError('format', 'Invalid palette format - expected JSON object');
  }

  if (!('colours' in data) && !('all_colours' in data)) {
    throw new PaletteInputError(
      'missing-field',
      "Invalid palette - missing 'colours' or 'all_colours' field",
    );
  }

  return paletteSchema.parse(data);
}

/**
 * Read the whole stream and validate it as a palette.
 */
export async function readPalette(stream: AsyncIterable<string | Buffer>): Promise<Palette> {
  let text: string;
  try {
    text = await readStream(stream);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new PaletteInputError('read', `Failed to read input: ${reason}`, { cause: error });
  }
  return parsePalette(text);
}
