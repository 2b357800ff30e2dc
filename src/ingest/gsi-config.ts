import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { logger } from '../logger.js';

/** Data blocks requested from the game client. */
export const GSI_DATA_BLOCKS = [
  'provider',
  'map',
  'round',
  'player_id',
  'player_state',
  'player_weapons',
  'player_match_stats',
  'allplayers_id',
  'allplayers_state',
  'allplayers_match_stats',
  'bomb',
  'phase_countdowns',
] as const;

/** Render the game client's integration config pointing at our listener. */
export function renderGsiConfig(port: number, token: string, name = 'Stream Cohost'): string {
  const lines = [
    `"${name}"`,
    '{',
    `    "uri"          "http://127.0.0.1:${port}/"`,
    '    "timeout"      "5.0"',
    '    "buffer"       "0.1"',
    '    "throttle"     "0.1"',
    '    "heartbeat"    "10.0"',
  ];
  if (token) {
    lines.push('    "auth"', '    {', `        "token"    "${token}"`, '    }');
  }
  lines.push('    "data"', '    {');
  for (const block of GSI_DATA_BLOCKS) {
    lines.push(`        "${block}"${' '.repeat(Math.max(1, 24 - block.length))}"1"`);
  }
  lines.push('    }', '}', '');
  return lines.join('\n');
}

export async function writeGsiConfig(path: string, port: number, token: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, renderGsiConfig(port, token), 'utf-8');
  logger.info(`Ingest: wrote game integration config to ${path} (copy it into the game's cfg directory)`);
}
