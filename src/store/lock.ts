import { mkdir, readFile, writeFile, unlink } from 'node:fs/promises';
import path from 'node:path';

export interface LockHandle {
  path: string;
  release(): Promise<void>;
}

export class LockedError extends Error {
  constructor(
    public readonly lockPath: string,
    public readonly pid: number,
  ) {
    super(`Another todoist-taskwarrior process is running (pid=${pid}, lock=${lockPath}).`);
    this.name = 'LockedError';
  }
}

async function readOwner(lockPath: string): Promise<number | undefined> {
  try {
    const parsed: unknown = JSON.parse(await readFile(lockPath, 'utf8'));
    if (typeof parsed === 'object' && parsed !== null && 'pid' in parsed && typeof parsed.pid === 'number') {
      return parsed.pid;
    }
  } catch {
    // unreadable or invalid: treated as stale
  }
  return undefined;
}

/** Advisory pid lock over the cache directory. Stale locks (dead pid, garbage) are taken over. */
export async function acquireLock(dir: string, filename = 'lock'): Promise<LockHandle> {
  await mkdir(dir, { recursive: true });
  const lockPath = path.join(dir, filename);
  const payload = JSON.stringify({ pid: process.pid, at: new Date().toISOString() }) + '\n';

  try {
    await writeFile(lockPath, payload, { flag: 'wx' });
  } catch {
    const owner = await readOwner(lockPath);
    if (owner !== undefined && owner !== process.pid && isProcessAlive(owner)) {
      throw new LockedError(lockPath, owner);
    }
    await writeFile(lockPath, payload, { flag: 'w' });
  }

  return {
    path: lockPath,
    release: async () => {
      await unlink(lockPath).catch(() => undefined);
    },
  };
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}
