import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { ENV_KEYS, LOG_PREFIX } from './constants';

function findUp(startDir: string, relativePath: string, maxDepth = 6): string | null {
  let dir = startDir;
  for (let i = 0; i <= maxDepth; i++) {
    const candidate = path.resolve(dir, relativePath);
    if (fs.existsSync(candidate)) return candidate;
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return null;
}

/**
 * Loads the nearest `apps/function/.env`, else the nearest `.env`, into `process.env`.
 * Variables already set in the shell win. Returns the loaded path, if any.
 */
export function loadDotenv(cwd: string = process.cwd()): string | null {
  const debug = process.env[ENV_KEYS.dotenvDebug] === '1';

  const envPath = findUp(cwd, 'apps/function/.env') ?? findUp(cwd, '.env');
  if (!envPath) return null;

  const res = dotenv.config({ path: envPath });
  if (res.error) {
    throw new Error(`Failed to load ${envPath}: ${res.error.message}`);
  }

  if (debug) {
    // eslint-disable-next-line no-console
    console.log(`${LOG_PREFIX} [dotenv] loaded ${envPath}`);
  }
  return envPath;
}
