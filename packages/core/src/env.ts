import { config as dotenvConfig } from 'dotenv';
import { existsSync } from 'node:fs';
import path from 'node:path';

const loaded = new Set<string>();

export function loadEnvFiles(projectRoot: string): string[] {
  const candidates = filterUnique(
    [process.env.SIGNALDESK_ENV_FILE, '.env', '.env.local'].filter(isPresent)
  );

  candidates.forEach((candidate) => {
    const fullPath = path.isAbsolute(candidate) ? candidate : path.join(projectRoot, candidate);
    if (!existsSync(fullPath) || loaded.has(fullPath)) {
      return;
    }
    dotenvConfig({ path: fullPath, override: true });
    loaded.add(fullPath);
  });

  return [...loaded];
}

function isPresent(value: string | undefined): value is string {
  return typeof value === 'string' && value.length > 0;
}

function filterUnique(values: string[]): string[] {
  return values.filter((value, index) => values.indexOf(value) === index);
}
