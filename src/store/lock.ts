import { mkdir, readFile, writeFile, unlink } from 'node:fs/promises';
import path from 'node:path';

export interface LockHandle {
  path: string;
  release(): Promise<void>;
}

export class LockHeldError extends Error {
  override readonly name = 'LockHeldError';

  constructor(
    public readonly lockPath: string,
    public readonly pid: number,
  ) {
    super(`Another task-mirror process holds ${lockPath} (pid=${pid}).`);
  }
}

function holderPid(raw: string): number | undefined {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (parsed && typeof parsed === 'object' && 'pid' in parsed && typeof parsed.pid === 'number') {
      return parsed.pid;
    }
  } catch {
    // unreadable lock files are stale
  }
  return undefined;
}

/** Take `<dir>/<name>.lock`; a lock left by a dead process is taken over. */
export async function acquireLock(dir: string, name = 'state'): Promise<LockHandle> {
  await mkdir(dir, { recursive: true });
  const lockPath = path.join(dir, `${name}.lock`);
  const payload = JSON.stringify({ pid: process.pid, at: new Date().toISOString() }) + '\n';

  try {
    await writeFile(lockPath, payload, { flag: 'wx' });
  } catch (err) {
    if (!(err instanceof Error && 'code' in err && err.code === 'EEXIST')) throw err;

    const otherPid = holderPid(await readFile(lockPath, 'utf8').catch(() => ''));
    if (otherPid !== undefined && otherPid !== process.pid && isProcessAlive(otherPid)) {
      throw new LockHeldError(lockPath, otherPid);
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
  } catch (e) {
    // EPERM: alive but owned by someone else
    return e instanceof Error && 'code' in e && e.code === 'EPERM';
  }
}
