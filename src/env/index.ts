import * as dotenv from 'dotenv';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { existsSync } from 'fs';

// Idempotent load guard
if (process.env.__ENV_LOADED !== '1') {
  try {
    const here = path.dirname(fileURLToPath(import.meta.url));
    const repoRoot = path.resolve(here, '..', '..');

    // Vitest sets VITEST='true'
    const isTestEnv = process.env.VITEST === 'true';

    // A .env in the working directory wins over the one shipped beside the package
    const candidates = [path.resolve(process.cwd(), '.env'), path.join(repoRoot, '.env')];
    const envPath = candidates.find((candidate) => existsSync(candidate));
    if (envPath) {
      // Values already exported by the shell (systemd units, containers) are kept
      dotenv.config({ path: envPath, override: false });
    }

    if (isTestEnv) {
      const testEnvPath = path.join(repoRoot, '.env.test');
      if (existsSync(testEnvPath)) {
        dotenv.config({ path: testEnvPath, override: true });
      }
    }

    process.env.__ENV_LOADED = '1';
  } catch (error) {
    console.warn(`[env] Failed to load .env: ${error instanceof Error ? error.message : String(error)}`);
  }
}

export { };
