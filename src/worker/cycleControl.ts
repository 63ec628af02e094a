import { existsSync, unlinkSync } from 'fs';
import { getOptionalSchedulerMaxCycles, getOptionalSchedulerStopFile } from '../config/index.js';
import { createChildLogger } from '../logging/index.js';

const cycleLogger = createChildLogger('CYCLE');

export function getMaxCycles(): number | undefined {
  return getOptionalSchedulerMaxCycles();
}

export function getStopFilePath(): string | undefined {
  return getOptionalSchedulerStopFile();
}

export function shouldStop(): boolean {
  const stopFilePath = getStopFilePath();
  if (!stopFilePath) return false;
  return existsSync(stopFilePath);
}

export function clearStopFile(): boolean {
  const stopFilePath = getStopFilePath();
  if (!stopFilePath || !existsSync(stopFilePath)) return false;
  try {
    unlinkSync(stopFilePath);
    return true;
  } catch (error) {
    cycleLogger.warn({ stopFilePath, error: error instanceof Error ? error.message : String(error) }, 'Could not remove stop file');
    return false;
  }
}
