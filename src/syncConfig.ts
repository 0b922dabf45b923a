export interface SyncConfig {
  /** Automation server base URL, without trailing slash. */
  serverUrl: string | null;
  cachePath: string;
  logPath: string | null;
  /** Explicit poll interval; null keeps the push-aware default. */
  pollIntervalMs: number | null;
  mirrorPort: number;
  verbose: boolean;
}

export const DEFAULT_CACHE_PATH = "./deck-cache.db";
export const DEFAULT_MIRROR_PORT = 4179;

export function normalizeBaseUrl(url: string): string {
  return url.trim().replace(/\/+$/, "");
}

/** `http(s)://host` → `ws(s)://host`. Other schemes pass through. */
export function toWebSocketBase(url: string): string {
  const base = normalizeBaseUrl(url);
  if (base.startsWith("https://")) return `wss://${base.slice("https://".length)}`;
  if (base.startsWith("http://")) return `ws://${base.slice("http://".length)}`;
  return base;
}

export function buildStreamUrl(baseUrl: string, path: string): string {
  const suffix = path.startsWith("/") ? path : `/${path}`;
  return `${toWebSocketBase(baseUrl)}${suffix}`;
}

function readString(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

function readPositiveInt(value: string | undefined): number | null {
  const raw = readString(value);
  if (raw === null) return null;
  const parsed = Number(raw);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : null;
}

function readFlag(value: string | undefined): boolean {
  const raw = readString(value)?.toLowerCase();
  return raw === "1" || raw === "true" || raw === "yes";
}

export function resolveSyncConfig(
  overrides: Partial<SyncConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): SyncConfig {
  const serverUrl = overrides.serverUrl ?? readString(env.DECK_SERVER_URL);
  return {
    serverUrl: serverUrl ? normalizeBaseUrl(serverUrl) : null,
    cachePath: overrides.cachePath ?? readString(env.DECK_CACHE_PATH) ?? DEFAULT_CACHE_PATH,
    logPath: overrides.logPath ?? readString(env.DECK_LOG_PATH),
    pollIntervalMs: overrides.pollIntervalMs ?? readPositiveInt(env.DECK_POLL_INTERVAL_MS),
    mirrorPort: overrides.mirrorPort ?? readPositiveInt(env.DECK_MIRROR_PORT) ?? DEFAULT_MIRROR_PORT,
    verbose: overrides.verbose ?? readFlag(env.DECK_VERBOSE),
  };
}
