/**
 * Shared constants for the notify-send plugin
 */

// ============================================================================
// Plugin Identity
// ============================================================================

export const PLUGIN_NAME = 'notify-send';
export const PLUGIN_VERSION = '1.0.1';
export const PROTOCOL_VERSION = '0.0.1';
export const PLUGIN_PROTOCOL = 'json-stdio';

// ============================================================================
// Palette Roles
// ============================================================================

/**
 * Semantic roles in the order they are listed in the notification body.
 * Input key order never affects output order.
 */
export const ROLE_ORDER = [
  ['background', 'Background'],
  ['backgroundMuted', 'Background Muted'],
  ['foreground', 'Foreground'],
  ['foregroundMuted', 'Foreground Muted'],
  ['accent1', 'Accent 1'],
  ['accent2', 'Accent 2'],
  ['accent3', 'Accent 3'],
  ['accent4', 'Accent 4'],
  ['danger', 'Danger'],
  ['warning', 'Warning'],
  ['success', 'Success'],
  ['info', 'Info'],
  ['notification', 'Notification'],
] as const;

export type ColourRole = (typeof ROLE_ORDER)[number][0];

// ============================================================================
// Theme Types
// ============================================================================

export const THEME_LABELS = ['Auto', 'Dark', 'Light'] as const;

export type ThemeLabel = (typeof THEME_LABELS)[number] | 'Unknown';

// ============================================================================
// Notification Text
// ============================================================================

export const TITLE_BASE = 'Tinct Colour Palette';

/** Separator between role label and hex; the verbose colour count keys on it. */
export const ROLE_SEPARATOR = ':';

export const INSTALL_HINTS = [
  'Ubuntu/Debian: sudo apt-get install libnotify-bin',
  'Arch: sudo pacman -S libnotify',
  'Fedora: sudo dnf install libnotify',
] as const;
