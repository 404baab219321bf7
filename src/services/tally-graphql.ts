import { z } from "zod";
import {
  TransportError,
  type GraphQLHttpResponse,
  type GraphQLTransport,
} from "./tally";
import {
  DEFAULT_RETRY_OPTIONS,
  errorMessage,
  exponentialBackoff,
  linearBackoff,
  sleep as defaultSleep,
  systemClock,
  type ClockFn,
  type RetryOptions,
  type SleepFn,
} from "./ingestion/utils";

// ─── Errors ──────────────────────────────────────────────────────────────────

export type FetchErrorKind =
  | "timeout"
  | "connection"
  | "rate_limited"
  | "server_error"
  | "application_error"
  | "permanent_http_error";

export class FetchError extends Error {
  readonly kind: FetchErrorKind;
  readonly status: number | null;
  readonly attempts: number;

  constructor(
    kind: FetchErrorKind,
    message: string,
    details: { status?: number; attempts: number; cause?: unknown }
  ) {
    super(message, { cause: details.cause });
    this.name = "FetchError";
    this.kind = kind;
    this.status = details.status ?? null;
    this.attempts = details.attempts;
  }
}

export type FetchResult<T> = { ok: true; data: T } | { ok: false; error: FetchError };

// ─── Rate Limit State ────────────────────────────────────────────────────────

export interface RateLimitOptions {
  floorDelayMs: number; // starting delay and lower clamp
  ceilingDelayMs: number;
  relaxFactor: number; // applied on every success
  escalateFactor: number; // applied on every 429
}

export const DEFAULT_RATE_LIMIT_OPTIONS: RateLimitOptions = {
  floorDelayMs: 600,
  ceilingDelayMs: 2000,
  relaxFactor: 0.98,
  escalateFactor: 1.5,
};

export interface ClientStats {
  totalRequests: number;
  totalAttempts: number;
  successfulRequests: number;
  failedRequests: number; // logical requests that gave up
  failedAttempts: number; // HTTP attempts that did not succeed, 429s included
  rateLimitedRequests: number;
  successRate: number; // percent of logical requests
  currentDelayMs: number;
  efficiency: number; // successes per HTTP attempt, 0..1
}

export interface GraphQLClient {
  send<T>(
    query: string,
    variables: Record<string, unknown>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<FetchResult<T>>;
  stats(): ClientStats;
}

export interface RateLimitedClientOptions {
  transport: GraphQLTransport;
  rateLimit?: Partial<RateLimitOptions>;
  retry?: Partial<RetryOptions>;
  sleep?: SleepFn;
  now?: ClockFn;
}

// ─── Response Types ──────────────────────────────────────────────────────────

const graphQLEnvelopeSchema = z.object({
  data: z.unknown().optional(),
  errors: z
    .array(z.object({ message: z.string().optional() }).passthrough())
    .nullish(),
});

const RETRYABLE_STATUSES = new Set([502, 503, 504]);

// ─── Core Client ─────────────────────────────────────────────────────────────

/**
 * GraphQL client that funnels every request of a run through one adaptive
 * delay. Create one instance per run and pass it to the ingestion services.
 */
export class RateLimitedClient implements GraphQLClient {
  private readonly transport: GraphQLTransport;
  private readonly limits: RateLimitOptions;
  private readonly retry: RetryOptions;
  private readonly sleep: SleepFn;
  private readonly now: ClockFn;

  private currentDelayMs: number;
  private nextRequestAt = 0;
  private gate: Promise<void> = Promise.resolve();

  private requestCount = 0;
  private attemptCount = 0;
  private successCount = 0;
  private failureCount = 0;
  private rateLimitCount = 0;

  constructor(options: RateLimitedClientOptions) {
    this.transport = options.transport;
    this.limits = { ...DEFAULT_RATE_LIMIT_OPTIONS, ...options.rateLimit };
    this.retry = { ...DEFAULT_RETRY_OPTIONS, ...options.retry };
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? systemClock;
    this.currentDelayMs = this.limits.floorDelayMs;
  }

  async send<T>(
    query: string,
    variables: Record<string, unknown>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<FetchResult<T>> {
    this.requestCount++;
    const maxAttempts = Math.max(1, this.retry.maxRetries);
    let lastError: FetchError | null = null;

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      const isFinalAttempt = attempt === maxAttempts - 1;
      await this.waitForSlot();
      this.attemptCount++;

      let response: GraphQLHttpResponse;
      try {
        response = await this.transport({ query, variables });
      } catch (error) {
        const kind = error instanceof TransportError ? error.kind : "connection";
        lastError = new FetchError(kind, `Request ${kind} error: ${errorMessage(error)}`, {
          attempts: attempt + 1,
          cause: error,
        });
        console.warn(`[Tally Client] ${lastError.message} (attempt ${attempt + 1}/${maxAttempts})`);
        if (!isFinalAttempt) {
          await this.sleep(linearBackoff(this.retry, attempt));
        }
        continue;
      }

      if (response.status === 200) {
        const payload = this.parsePayload(response.body, schema);
        if (payload.ok) {
          this.relax();
          this.successCount++;
          return payload;
        }

        lastError = new FetchError("application_error", payload.message, {
          status: 200,
          attempts: attempt + 1,
        });
        console.warn(`[Tally Client] ${payload.message}`);
        if (isFinalAttempt) break;
        continue;
      }

      if (response.status === 429) {
        this.rateLimitCount++;
        this.escalate();
        lastError = new FetchError("rate_limited", "Rate limited (HTTP 429)", {
          status: 429,
          attempts: attempt + 1,
        });
        if (!isFinalAttempt) {
          const backoff = exponentialBackoff(this.retry, attempt);
          console.warn(
            `[Tally Client] Rate limited. Backing off for ${backoff}ms ` +
              `(attempt ${attempt + 1}, delay now ${Math.round(this.currentDelayMs)}ms)`
          );
          await this.sleep(backoff);
        }
        continue;
      }

      if (RETRYABLE_STATUSES.has(response.status)) {
        lastError = new FetchError("server_error", `Server error ${response.status}`, {
          status: response.status,
          attempts: attempt + 1,
        });
        if (!isFinalAttempt) {
          const backoff = exponentialBackoff(this.retry, attempt);
          console.warn(`[Tally Client] Server error ${response.status}. Retrying in ${backoff}ms`);
          await this.sleep(backoff);
        }
        continue;
      }

      this.failureCount++;
      const preview = previewBody(response.body);
      console.error(`[Tally Client] HTTP Error ${response.status}: ${preview}`);
      return {
        ok: false,
        error: new FetchError(
          "permanent_http_error",
          `HTTP ${response.status}: ${preview}`,
          { status: response.status, attempts: attempt + 1 }
        ),
      };
    }

    const error =
      lastError ?? new FetchError("connection", "Request was never attempted", { attempts: 0 });
    this.failureCount++;
    console.error(`[Tally Client] Failed after ${maxAttempts} attempts: ${error.message}`);
    return { ok: false, error };
  }

  stats(): ClientStats {
    const total = Math.max(this.requestCount, 1);
    const attempts = Math.max(this.attemptCount, 1);
    return {
      totalRequests: this.requestCount,
      totalAttempts: this.attemptCount,
      successfulRequests: this.successCount,
      failedRequests: this.failureCount,
      failedAttempts: this.attemptCount - this.successCount,
      rateLimitedRequests: this.rateLimitCount,
      successRate: Math.round((this.successCount / total) * 1000) / 10,
      currentDelayMs: Math.round(this.currentDelayMs),
      efficiency: Math.round((this.successCount / attempts) * 10000) / 10000,
    };
  }

  /**
   * Serialises slot reservation: wait until the earliest next request time,
   * then push it out by the current delay. The network call happens outside.
   */
  private waitForSlot(): Promise<void> {
    const turn = this.gate.then(async () => {
      const waitMs = this.nextRequestAt - this.now();
      if (waitMs > 0) {
        await this.sleep(waitMs);
      }
      this.nextRequestAt = this.now() + this.currentDelayMs;
    });
    // The caller observes a rejection through `turn`; the chain must keep going
    this.gate = turn.catch(() => undefined);
    return turn;
  }

  private relax(): void {
    this.currentDelayMs = Math.max(
      this.limits.floorDelayMs,
      this.currentDelayMs * this.limits.relaxFactor
    );
  }

  private escalate(): void {
    this.currentDelayMs = Math.min(
      this.limits.ceilingDelayMs,
      this.currentDelayMs * this.limits.escalateFactor
    );
  }

  private parsePayload<T>(
    body: unknown,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): { ok: true; data: T } | { ok: false; message: string } {
    const envelope = graphQLEnvelopeSchema.safeParse(body);
    if (!envelope.success) {
      return { ok: false, message: "Response body is not a GraphQL envelope" };
    }

    const errors = envelope.data.errors ?? [];
    if (errors.length > 0) {
      const msg = errors.map((e) => e.message ?? "unknown error").join("; ");
      return { ok: false, message: `GraphQL errors: ${msg}` };
    }

    const data = schema.safeParse(envelope.data.data);
    if (!data.success) {
      return {
        ok: false,
        message: `Unexpected response shape: ${data.error.issues[0]?.message ?? "invalid"}`,
      };
    }
    return { ok: true, data: data.data };
  }
}

function previewBody(body: unknown): string {
  const text = typeof body === "string" ? body : JSON.stringify(body) ?? "";
  return text.slice(0, 200);
}
