import { parseStatusResponse, type Job } from "../domain/jobs.js";
import { normalizeBaseUrl } from "../syncConfig.js";
import {
  fromHttpStatus,
  invalidMessageError,
  isAbortTimeout,
  isTransient,
  timeoutError,
  toSyncError,
  type SyncError,
} from "../syncErrors.js";
import { createLogger } from "../syncLogger.js";

const log = createLogger("status");

export const STATUS_TIMEOUT_MS = 30_000;
export const PROBE_TIMEOUT_MS = 5_000;

/** Read-only view of the automation server used by the coordinator. */
export interface StatusApi {
  fetchStatus(): Promise<Map<string, Job>>;
  /** Raw workflow state for one issue; shape is validated by the caller. */
  fetchWorkflowState(repo: string, issueNum: number): Promise<unknown>;
  /** Whether the server exposes the push events stream. */
  probeEvents(): Promise<boolean>;
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpStatusClientOptions {
  timeoutMs?: number;
  probeTimeoutMs?: number;
  /** Extra attempts after the first, for timeouts, refused connections and 5xx. */
  maxRetries?: number;
  retryDelayMs?: number;
  fetchImpl?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class HttpStatusClient implements StatusApi {
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;
  private readonly probeTimeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(baseUrl: string, options: HttpStatusClientOptions = {}) {
    this.baseUrl = normalizeBaseUrl(baseUrl);
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.timeoutMs = options.timeoutMs ?? STATUS_TIMEOUT_MS;
    this.probeTimeoutMs = options.probeTimeoutMs ?? PROBE_TIMEOUT_MS;
    this.maxRetries = options.maxRetries ?? 2;
    this.retryDelayMs = options.retryDelayMs ?? 500;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async fetchStatus(): Promise<Map<string, Job>> {
    const body = await this.getJsonWithRetry("/api/status");
    return parseStatusResponse(body);
  }

  async fetchWorkflowState(repo: string, issueNum: number): Promise<unknown> {
    const repoPath = repo.split("/").map(encodeURIComponent).join("/");
    return this.getJsonWithRetry(`/issues/${repoPath}/${issueNum}/workflow`);
  }

  /**
   * A websocket endpoint answers a plain GET with 400 or 426; a server
   * without push answers 404. Any failure reads as "no push".
   */
  async probeEvents(): Promise<boolean> {
    try {
      const response = await this.fetchImpl(`${this.baseUrl}/ws/events`, {
        signal: AbortSignal.timeout(this.probeTimeoutMs),
      });
      await response.body?.cancel();
      const available = response.status !== 404 && response.status !== 405;
      log.info(`Events stream ${available ? "available" : "unavailable"} (HTTP ${response.status})`);
      return available;
    } catch (error) {
      log.warn("Events probe failed, falling back to polling", toSyncError(error).message);
      return false;
    }
  }

  private async getJsonWithRetry(path: string): Promise<unknown> {
    let lastError: SyncError | null = null;
    for (let attempt = 0; attempt <= this.maxRetries; attempt += 1) {
      if (attempt > 0) {
        await this.sleep(this.retryDelayMs * attempt);
      }
      try {
        return await this.getJson(path);
      } catch (error) {
        lastError = toSyncError(error, "ConnectionFailed");
        if (!isTransient(lastError) || attempt === this.maxRetries) break;
        log.warn(`GET ${path} failed (attempt ${attempt + 1}), retrying`, lastError.message);
      }
    }
    throw lastError ?? new Error(`GET ${path} failed`);
  }

  private async getJson(path: string): Promise<unknown> {
    const url = `${this.baseUrl}${path}`;
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        headers: { Accept: "application/json" },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      if (isAbortTimeout(error)) throw timeoutError(`GET ${path}`, this.timeoutMs, error);
      throw toSyncError(error, "ConnectionFailed");
    }

    if (!response.ok) {
      const body = await response.text().catch(() => "");
      throw fromHttpStatus(response.status, body);
    }

    const text = await response.text();
    try {
      return JSON.parse(text);
    } catch (error) {
      throw invalidMessageError(`GET ${path} returned non-JSON body`, error);
    }
  }
}
