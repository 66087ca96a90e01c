import { readFileSync, existsSync } from 'node:fs';
import path from 'node:path';

/**
 * Parse KEY=VALUE lines of a .env file.
 *
 * Comments, blank lines and an optional leading `export ` are accepted;
 * single or double quotes around a value are removed.
 */
export function parseEnvFile(raw: string): Record<string, string> {
  const out: Record<string, string> = {};

  for (const line of raw.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;

    const body = trimmed.startsWith('export ') ? trimmed.slice('export '.length) : trimmed;
    const eq = body.indexOf('=');
    if (eq === -1) continue;

    const key = body.slice(0, eq).trim();
    let value = body.slice(eq + 1).trim();
    if (
      value.length >= 2 &&
      ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'")))
    ) {
      value = value.slice(1, -1);
    }

    if (key) out[key] = value;
  }

  return out;
}

/**
 * Load .env files into `env` without overriding keys that are already set.
 * Credentials live here rather than in the JSON config.
 */
export function loadEnvFiles(
  filenames: string[] = ['.env', '.env.local'],
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
): { loaded: string[] } {
  const loaded: string[] = [];

  for (const name of filenames) {
    const filePath = path.join(cwd, name);
    if (!existsSync(filePath)) continue;

    for (const [key, value] of Object.entries(parseEnvFile(readFileSync(filePath, 'utf8')))) {
      if (env[key] === undefined) env[key] = value;
    }
    loaded.push(name);
  }

  return { loaded };
}
