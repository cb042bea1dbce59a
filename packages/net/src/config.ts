function bool(v: string | undefined, d = false): boolean {
  return v === 'true' ? true : v === 'false' ? false : d;
}

function num(v: string | undefined, d: number): number {
  const n = v ? Number(v) : NaN;
  return Number.isFinite(n) ? n : d;
}

/**
 * Build the package configuration from an environment.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env) {
  return {
    dial: {
      outgoingAccessAllowed: bool(env.OUTGOING_ACCESS_ALLOWED, true),
    },

    http: {
      connectTimeoutMs: num(env.HTTP_CONNECT_TIMEOUT_MS, 10000),
    },
  };
}

export type NetConfig = ReturnType<typeof loadConfig>;

export const config: NetConfig = loadConfig();
