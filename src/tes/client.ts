/**
 * Thin HTTP client for the GA4GH Task Execution Service (TES) API.
 * Uses native fetch, no SDK dependency.
 */
import type { ZodType, ZodTypeDef } from "zod";
import type { Logger } from "../utils/logger.js";
import { PLACEHOLDER_TOKEN, type TesConfig } from "../utils/config.js";
import {
  MinimalTesTaskSchema,
  TesCreateTaskResponseSchema,
  TesServiceInfoSchema,
  TesTaskSchema,
  serializeTask,
  type FetchedTask,
  type TesServiceInfo,
  type TesTask,
} from "./models.js";
import {
  TesAuthenticationError,
  TesClientError,
  TesError,
  TesNotFoundError,
  TesServerError,
  TesValidationError,
} from "./errors.js";
import { RETRYABLE_STATUSES, fetchWithRetry, type RetryPolicy, type Sleep } from "./retry.js";
import { TES_VIEWS, isTesView } from "./state.js";

const USER_AGENT = "tes-task-mcp/1.0";
const HEALTH_CHECK_TIMEOUT_MS = 10_000;

/** Status and fully read body of one HTTP exchange. */
interface TesResponse {
  status: number;
  text: string;
}

/** The operations the tool layer needs from a TES service. */
export interface TesApi {
  submitTask(task: TesTask): Promise<string>;
  getTask(taskId: string, view?: string): Promise<FetchedTask>;
  healthCheck(): Promise<boolean>;
}

export interface TesClientOptions {
  baseUrl?: string;
  authToken?: string;
  timeoutMs: number;
  retry: RetryPolicy;
  /** Injected for tests; defaults to the global fetch. */
  fetchImpl?: typeof fetch;
  sleep?: Sleep;
}

export class TesClient implements TesApi {
  readonly baseUrl: string;
  private authToken?: string;
  private timeoutMs: number;
  private retry: RetryPolicy;
  private fetchImpl: typeof fetch;
  private sleep?: Sleep;
  private logger: Logger;

  constructor(options: TesClientOptions, logger: Logger) {
    if (!options.baseUrl) {
      throw new TesClientError(
        "TES service URL is required. Set TES_URL environment variable or provide baseUrl."
      );
    }

    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.authToken = options.authToken;
    this.timeoutMs = options.timeoutMs;
    this.retry = options.retry;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.sleep = options.sleep;
    this.logger = logger;

    if (!this.authToken || this.authToken === PLACEHOLDER_TOKEN) {
      this.logger.warn(
        "No authentication token provided or using default token. Set TES_TOKEN environment variable for secure access."
      );
    }
  }

  static fromConfig(
    config: TesConfig,
    logger: Logger,
    overrides: Pick<TesClientOptions, "fetchImpl" | "sleep"> = {}
  ): TesClient {
    return new TesClient(
      {
        baseUrl: config.url,
        authToken: config.token,
        timeoutMs: config.request_timeout_seconds * 1000,
        retry: {
          maxRetries: config.max_retries,
          backoffFactor: config.backoff_factor,
          retryableStatuses: RETRYABLE_STATUSES,
        },
        ...overrides,
      },
      logger
    );
  }

  /** Submit a task and return the id the service assigned. */
  async submitTask(task: TesTask): Promise<string> {
    const endpoint = `${this.baseUrl}/tasks`;
    this.logger.info({ endpoint, taskName: task.name }, "Creating task");
    this.logger.debug({ task }, "Task payload");

    try {
      const { status, text } = await this.request(endpoint, {
        method: "POST",
        body: JSON.stringify(serializeTask(task)),
      });
      this.raiseForStatus(status, text, "create task");

      const result = this.parseBody(parseJson(text), TesCreateTaskResponseSchema);
      if (!result.id) {
        throw new TesValidationError("Task creation succeeded but no task ID was returned.");
      }

      this.logger.info({ taskId: result.id }, "Task created");
      return result.id;
    } catch (err) {
      throw this.wrap(err, "creating task");
    }
  }

  /**
   * Retrieve a task. MINIMAL returns only id and state; BASIC (default) adds
   * inputs, outputs and resources; FULL adds logs.
   */
  async getTask(taskId: string, view: string = "BASIC"): Promise<FetchedTask> {
    if (!isTesView(view)) {
      throw new TesClientError(`Invalid view '${view}'. Must be one of: ${TES_VIEWS.join(", ")}`);
    }

    const endpoint = `${this.baseUrl}/tasks/${encodeURIComponent(taskId)}?view=${view}`;
    this.logger.info({ taskId, view }, "Retrieving task");

    try {
      const { status, text } = await this.request(endpoint, { method: "GET" });
      if (status === 404) {
        throw new TesNotFoundError(`Task ${taskId} not found.`, taskId, { status: 404 });
      }
      this.raiseForStatus(status, text, `retrieve task ${taskId}`);

      const body = parseJson(text);
      const task =
        view === "MINIMAL"
          ? this.parseBody(body, MinimalTesTaskSchema)
          : this.parseBody(body, TesTaskSchema);

      this.logger.info({ taskId, state: task.state }, "Task retrieved");
      return task;
    } catch (err) {
      throw this.wrap(err, `retrieving task ${taskId}`);
    }
  }

  async getServiceInfo(): Promise<TesServiceInfo> {
    try {
      const { status, text } = await this.request(`${this.baseUrl}/service-info`, {
        method: "GET",
      });
      this.raiseForStatus(status, text, "retrieve service info");
      return this.parseBody(parseJson(text), TesServiceInfoSchema);
    } catch (err) {
      throw this.wrap(err, "retrieving service info");
    }
  }

  /** Best effort: true only when /service-info answers 200. Never throws. */
  async healthCheck(): Promise<boolean> {
    try {
      const { status } = await this.request(
        `${this.baseUrl}/service-info`,
        { method: "GET" },
        HEALTH_CHECK_TIMEOUT_MS
      );
      return status === 200;
    } catch (err) {
      this.logger.warn({ error: err }, "Health check failed");
      return false;
    }
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      Accept: "application/json",
      "User-Agent": USER_AGENT,
    };
    if (this.authToken) {
      headers["Authorization"] = `Bearer ${this.authToken}`;
    }
    return headers;
  }

  /**
   * One logical request: per-attempt timeout, retried per the policy.
   * The body is read before the timer is cleared, so a response that stalls
   * mid-body times out like one that never arrives.
   */
  private request(
    url: string,
    init: RequestInit,
    timeoutMs = this.timeoutMs
  ): Promise<TesResponse> {
    const attempt = async (): Promise<TesResponse> => {
      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(), timeoutMs);
      try {
        const res = await this.fetchImpl(url, {
          ...init,
          headers: this.headers(),
          signal: controller.signal,
        });
        return { status: res.status, text: await res.text() };
      } finally {
        clearTimeout(timer);
      }
    };
    return fetchWithRetry(attempt, this.retry, this.logger, this.sleep);
  }

  private raiseForStatus(status: number, text: string, action: string): void {
    if (status >= 200 && status < 300) {
      return;
    }
    if (status === 401) {
      throw new TesAuthenticationError("Authentication failed. Check your TES_TOKEN.", {
        status: 401,
      });
    }
    if (status === 403) {
      throw new TesAuthenticationError("Access forbidden. Check your permissions.", {
        status: 403,
      });
    }
    if (status >= 500) {
      throw new TesServerError(`TES server error (${status}): ${text}`, { status });
    }
    throw new TesServerError(`Failed to ${action}: HTTP ${status}: ${text}`, { status });
  }

  private parseBody<T>(body: unknown, schema: ZodType<T, ZodTypeDef, unknown>): T {
    const result = schema.safeParse(body);
    if (!result.success) {
      throw new TesClientError(
        `TES service returned a malformed response: ${result.error.issues
          .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
          .join("; ")}`,
        { cause: result.error }
      );
    }
    return result.data;
  }

  private wrap(err: unknown, action: string): TesError {
    if (err instanceof TesError) {
      this.logger.error({ error: err.message, kind: err.kind }, `Failed ${action}`);
      return err;
    }
    const message = err instanceof Error ? err.message : String(err);
    this.logger.error({ error: message }, `Network error ${action}`);
    return new TesClientError(`Network error while ${action}: ${message}`, { cause: err });
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new TesClientError("TES service returned a response that is not valid JSON.", {
      cause: err,
    });
  }
}
