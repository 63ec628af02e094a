/**
 * Filenames currently inside the publish pipeline of this scheduler
 * process. Held from the start of a publish; released only on failure, so a
 * published filename stays locked until processed.json reflects it.
 */
export class ProcessingLock {
  private readonly held = new Set<string>();

  /** @returns false when the filename is already held */
  acquire(filename: string): boolean {
    if (this.held.has(filename)) return false;
    this.held.add(filename);
    return true;
  }

  release(filename: string): void {
    this.held.delete(filename);
  }

  has(filename: string): boolean {
    return this.held.has(filename);
  }

  snapshot(): string[] {
    return [...this.held];
  }
}
