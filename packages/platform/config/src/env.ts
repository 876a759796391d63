export type EnvSource = Readonly<Record<string, string | undefined>>;

export function readEnvString(env: EnvSource, key: string): string | undefined {
  const raw = env[key]?.trim();
  return raw ? raw : undefined;
}

export function readEnvList(env: EnvSource, key: string): string[] | undefined {
  const raw = readEnvString(env, key);
  if (raw === undefined) return undefined;
  return raw
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

