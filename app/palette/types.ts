import { z } from 'zod';
import { flagSchema } from '../config/schema.js';

/**
 * A single extracted colour. Only `hex` is consumed here; the pipeline also
 * sends rgb, role, luminance and friends, which pass through untouched.
 */
export const colourRecordSchema = z
  .object({
    hex: z.string().optional().catch(undefined),
  })
  .passthrough();

/**
 * Palette document as written to stdin by the host. Fields of the wrong
 * shape degrade to their empty value; structural checks (top-level object,
 * colour keys present) happen before this schema runs.
 */
export const paletteSchema = z
  .object({
    theme_type: z.unknown(),
    colours: z.record(z.string(), colourRecordSchema.catch({})).catch({}),
    all_colours: z.array(z.unknown()).catch([]),
    plugin_args: z.record(z.string(), z.unknown()).catch({}),
    dry_run: flagSchema(false),
  })
  .transform((raw) => ({
    themeType: raw.theme_type,
    colours: raw.colours,
    allColours: raw.all_colours,
    pluginArgs: raw.plugin_args,
    dryRun: raw.dry_run,
  }));

export type ColourRecord = z.infer<typeof colourRecordSchema>;
export type Palette = z.infer<typeof paletteSchema>;

