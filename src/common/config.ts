// Environment-derived settings, read once and cached.

export const DEFAULT_STACK_SIZE = 2048;

export interface TernConfig {
  trace: boolean;
  stackSize: number;
}

let cached: TernConfig | undefined;

function parseFlag(raw: string | undefined): boolean {
  const v = (raw || '').toLowerCase();
  return v === '1' || v === 'true';
}

function parseStackSize(raw: string | undefined): number {
  if (raw === undefined || !/^\d+$/.test(raw.trim())) return DEFAULT_STACK_SIZE;
  const size = Number(raw.trim());
  return size > 0 ? size : DEFAULT_STACK_SIZE;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): TernConfig {
  return {
    trace: parseFlag(env['TERN_TRACE']),
    stackSize: parseStackSize(env['TERN_STACK_SIZE']),
  };
}

export function getConfig(): TernConfig {
  if (cached === undefined) {
    cached = loadConfig();
  }
  return cached;
}

// For tests only: drop the cached values so the next getConfig() re-reads the environment.
export function resetConfigCache(): void {
  cached = undefined;
}
