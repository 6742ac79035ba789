import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';

/**
 * Loads the first env file found next to the working directory or one level
 * up. Variables already set in the process environment are kept.
 */
export function loadEnv(cwd = process.cwd()): string | null {
  const candidates = ['.env.local', '.env'].flatMap((name) => [
    path.resolve(cwd, name),
    path.resolve(cwd, '..', name)
  ]);

  const envPath = candidates.find((candidate) => fs.existsSync(candidate)) ?? null;
  if (envPath) {
    dotenv.config({ path: envPath });
  }
  return envPath;
}
