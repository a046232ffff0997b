import type { PluginConfig } from '../config/index.js';
import type { ColourRecord, Palette } from '../palette/types.js';
import {
  ROLE_ORDER,
  ROLE_SEPARATOR,
  THEME_LABELS,
  TITLE_BASE,
  type ColourRole,
  type ThemeLabel,
} from '../shared/constants.js';

export interface ComposedNotification {
  title: string;
  body: string;
  /** Body before joining; `body === lines.join('\n')`. */
  lines: readonly string[];
}

/**
 * Map the host's theme type to a display label.
 *
 * 0/1/2 are auto/dark/light; a missing value means auto. The theme name
 * itself (any case) is accepted too. Everything else is "Unknown".
 */
export function resolveThemeLabel(themeType: unknown): ThemeLabel {
  if (themeType === undefined) {
    return 'Auto';
  }

  if (typeof themeType === 'number' && Number.isInteger(themeType)) {
    return THEME_LABELS[themeType] ?? 'Unknown';
  }

  if (typeof themeType === 'string') {
    const name = themeType.trim().toLowerCase();
    return THEME_LABELS.find((label) => label.toLowerCase() === name) ?? 'Unknown';
  }

  return 'Unknown';
}

export function composeTitle(themeLabel: ThemeLabel, config: PluginConfig): string {
  if (config.title !== undefined) {
    return config.title;
  }

  const title = `${TITLE_BASE} (${themeLabel} Theme)`;
  return config.titlePrefix ? `${config.titlePrefix} ${title}` : title;
}

/**
 * Upper-cased hex for a role, or '' when the role is absent or has no hex.
 */
export function roleHex(colours: Readonly<Record<string, ColourRecord>>, role: ColourRole): string {
  const entry: ColourRecord | undefined = colours[role];
  return (entry?.hex ?? '').toUpperCase();
}

export function composeBodyLines(palette: Palette, config: PluginConfig): string[] {
  const lines: string[] = [];

  for (const [role, label] of ROLE_ORDER) {
    const hex = roleHex(palette.colours, role);
    if (hex && config.showHex) {
      lines.push(`  ${label}${ROLE_SEPARATOR} ${hex}`);
    }
  }

  if (palette.allColours.length > 0 && config.showCount) {
    lines.push(`\nTotal colours extracted: ${palette.allColours.length}`);
  }

  if (config.message !== undefined) {
    lines.push(`\n${config.message}`);
  }

  return lines;
}

/**
 * Build the notification title and body for a palette. Pure; missing or
 * malformed palette content is left out of the body rather than reported.
 */
export function composeNotification(palette: Palette, config: PluginConfig): ComposedNotification {
  const title = composeTitle(resolveThemeLabel(palette.themeType), config);
  const lines = composeBodyLines(palette, config);

  return {
    title,
    body: lines.join('\n'),
    lines,
  };
}

/**
 * Number of body lines that look like colour entries (contain the role
 * separator). The total-count line and a message containing the separator
 * are counted as well.
 */
export function countColourLines(notification: ComposedNotification): number {
  return notification.lines.filter((line) => line.includes(ROLE_SEPARATOR)).length;
}
