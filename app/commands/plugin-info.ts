import {
  PLUGIN_NAME,
  PLUGIN_PROTOCOL,
  PLUGIN_VERSION,
  PROTOCOL_VERSION,
} from '../shared/constants.js';
import type { OutputStream } from '../shared/types.js';

export interface PluginInfo {
  name: string;
  type: 'input' | 'output';
  version: string;
  protocol_version: string;
  plugin_protocol: string;
  description: string;
  enabled: boolean;
  author: string;
  requires: string[];
}

export const PLUGIN_INFO: PluginInfo = {
  name: PLUGIN_NAME,
  type: 'output',
  version: PLUGIN_VERSION,
  protocol_version: PROTOCOL_VERSION,
  plugin_protocol: PLUGIN_PROTOCOL,
  description: 'Send desktop notifications with colour palette information',
  enabled: false,
  author: 'Tinct Contributors',
  requires: ['notify-send'],
};

/**
 * Answer the host's `--plugin-info` query. Never touches stdin.
 */
export function showPluginInfo(stdout: OutputStream): number {
  stdout.write(`${JSON.stringify(PLUGIN_INFO, null, 2)}\n`);
  return 0;
}
