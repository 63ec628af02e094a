import { existsSync, mkdirSync, readFileSync, unlinkSync } from 'fs';
import { join } from 'path';
import writeFileAtomic from 'write-file-atomic';
import { createChildLogger } from '../logging/index.js';
import { InstanceAlreadyRunningError } from '../shared/errors.js';

const lockLogger = createChildLogger('INSTANCE_LOCK');

export type RoleName = 'scheduler' | 'watcher' | 'mover';

export interface InstanceLock {
  readonly role: RoleName;
  readonly pidFile: string;
  release(): void;
}

/**
 * Signal 0 checks for existence without delivering anything. EPERM means
 * the process exists under another user.
 */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return error instanceof Error && 'code' in error && error.code === 'EPERM';
  }
}

export function pidFilePath(dataDir: string, role: RoleName): string {
  return join(dataDir, `${role}.pid`);
}

function readPid(pidFile: string): number | null {
  try {
    const pid = Number.parseInt(readFileSync(pidFile, 'utf8').trim(), 10);
    return Number.isInteger(pid) && pid > 0 ? pid : null;
  } catch {
    return null;
  }
}

/**
 * Claim `<dataDir>/<role>.pid` for this process.
 *
 * @throws InstanceAlreadyRunningError when the file names another live process
 */
export function acquireInstanceLock(
  role: RoleName,
  dataDir: string,
  options: { pid?: number; isAlive?: (pid: number) => boolean } = {}
): InstanceLock {
  const pid = options.pid ?? process.pid;
  const isAlive = options.isAlive ?? isProcessAlive;
  const pidFile = pidFilePath(dataDir, role);

  if (existsSync(pidFile)) {
    const existing = readPid(pidFile);
    if (existing !== null && existing !== pid && isAlive(existing)) {
      throw new InstanceAlreadyRunningError(role, existing);
    }
    lockLogger.warn({ role, pidFile, stalePid: existing }, 'Replacing stale pid file');
  }

  mkdirSync(dataDir, { recursive: true });
  writeFileAtomic.sync(pidFile, `${pid}\n`);
  lockLogger.debug({ role, pid, pidFile }, 'Acquired instance lock');

  let released = false;
  return {
    role,
    pidFile,
    release(): void {
      if (released) return;
      released = true;
      if (readPid(pidFile) !== pid) return;
      try {
        unlinkSync(pidFile);
      } catch (error) {
        lockLogger.warn({ role, pidFile, error: error instanceof Error ? error.message : String(error) }, 'Could not remove pid file');
      }
    },
  };
}
