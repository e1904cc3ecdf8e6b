const TRUTHY = new Set(["1", "true", "yes", "y", "on"]);
const FALSY = new Set(["0", "false", "no", "n", "off"]);

export function readEnv(name: string): string | null {
  const value = process.env[name];
  if (!value) return null;
  return value.trim();
}

export function readEnvRaw(name: string): string | undefined {
  return process.env[name];
}

/** null when the variable is unset, blank or not a recognised flag word */
export function readFlagEnv(name: string): boolean | null {
  const raw = readEnvRaw(name);
  if (raw == null) return null;
  const normalized = raw.trim().toLowerCase();
  if (TRUTHY.has(normalized)) return true;
  if (FALSY.has(normalized)) return false;
  return null;
}
