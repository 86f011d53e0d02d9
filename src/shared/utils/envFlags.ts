// Shared helpers for reading environment flags. Kept free of server imports
// so the config layer can use them before the config object exists.

type ProcessEnv = Record<string, string | undefined>;
function getProcessEnv(): ProcessEnv | undefined {
  if (typeof process !== 'undefined' && typeof process.env === 'object') {
    return process.env;
  }
  return undefined;
}

export function readEnv(name: string): string | undefined {
  const env = getProcessEnv();
  if (env) {
    const value = env[name];
    if (typeof value === 'string') {
      return value;
    }
  }

  return undefined;
}

/**
 * Returns true if running inside a Jest worker process.
 * This is useful for detecting test runtime even when NODE_ENV might be
 * configured differently (e.g., NODE_ENV=development in Jest).
 */
export function isJestRuntime(): boolean {
  return readEnv('JEST_WORKER_ID') !== undefined;
}
