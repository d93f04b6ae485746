import os from 'node:os';
import path from 'node:path';

/** $SYSDECK_CONFIG, else the XDG config dir, else ~/.config. */
export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  if (env.SYSDECK_CONFIG) return env.SYSDECK_CONFIG;
  const base = env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config');
  return path.join(base, 'sysdeck', 'config.yaml');
}

export const CONFIG_PATH = resolveConfigPath();
