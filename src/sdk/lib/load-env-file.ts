import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';

const parseLine = (line: string): [string, string] | null => {
  const trimmed = line.trim().replace(/^export\s+/, '');

  if (!trimmed || trimmed.startsWith('#')) {
    return null;
  }

  const separatorIndex = trimmed.indexOf('=');

  if (separatorIndex <= 0) {
    return null;
  }

  const key = trimmed.slice(0, separatorIndex).trim();
  const value = trimmed.slice(separatorIndex + 1).trim().replace(/^['"]|['"]$/g, '');

  if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(key)) {
    return null;
  }

  return [key, value];
};

/**
 * Copies `KEY=value` pairs from a dotenv file into `target` without
 * overriding keys that are already set. Returns the keys it applied.
 */
export const loadEnvFile = (filePath = '.env', target: NodeJS.ProcessEnv = process.env): string[] => {
  const absolutePath = resolve(process.cwd(), filePath);

  if (!existsSync(absolutePath)) {
    return [];
  }

  const applied: string[] = [];
  const lines = readFileSync(absolutePath, 'utf-8').split(/\r?\n/);

  for (const line of lines) {
    const parsed = parseLine(line);

    if (!parsed) {
      continue;
    }

    const [key, value] = parsed;

    if (target[key] === undefined) {
      target[key] = value;
      applied.push(key);
    }
  }

  return applied;
};
