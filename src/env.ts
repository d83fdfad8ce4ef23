import { readFileSync, existsSync } from 'node:fs';
import path from 'node:path';

function parseLine(line: string): [key: string, value: string] | undefined {
  const trimmed = line.trim().replace(/^export\s+/, '');
  if (!trimmed || trimmed.startsWith('#')) return undefined;

  const eq = trimmed.indexOf('=');
  if (eq <= 0) return undefined;
  const key = trimmed.slice(0, eq).trim();
  let value = trimmed.slice(eq + 1).trim();

  const quote = value[0];
  if ((quote === '"' || quote === "'") && value.endsWith(quote) && value.length >= 2) {
    value = value.slice(1, -1);
  } else {
    // unquoted: drop trailing comment
    value = value.replace(/\s+#.*$/, '');
  }
  return [key, value];
}

/**
 * Load `KEY=VALUE` files into `env` without overriding keys already set.
 * Accepts `export KEY=...`, quoted values and trailing comments.
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

    for (const line of readFileSync(filePath, 'utf8').split(/\r?\n/)) {
      const kv = parseLine(line);
      if (!kv) continue;
      const [key, value] = kv;
      if (env[key] === undefined) env[key] = value;
    }

    loaded.push(name);
  }

  return { loaded };
}
