export type Env = Record<string, string | undefined>;

export function required(env: Env, name: string): string {
  const val = env[name];
  if (!val) throw new Error(`Missing required env var: ${name}`);
  return val;
}

export function optional(env: Env, name: string, fallback: string): string {
  const val = env[name];
  return val ? val : fallback;
}

export function optionalNumber(env: Env, name: string, fallback: number): number {
  const val = env[name];
  if (!val) return fallback;
  const parsed = Number(val);
  if (!Number.isFinite(parsed)) throw new Error(`Env var ${name} must be a number, got "${val}"`);
  return parsed;
}

export function requiredInteger(env: Env, name: string): number {
  const val = required(env, name);
  const parsed = Number(val);
  if (!Number.isSafeInteger(parsed)) throw new Error(`Env var ${name} must be an integer, got "${val}"`);
  return parsed;
}
