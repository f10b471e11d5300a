/**
 * Client for the prediction service, used by the form page and the CLI.
 * Requires a global fetch (Node 18+ or a browser).
 *
 * Every call is a single attempt: failures surface as `TransportError` and
 * retrying is left to the user.
 */
import { z } from "zod";
import type { ClinicalObservation, PredictResponse } from "./types";

export type FetchLike = (
  input: RequestInfo | URL,
  init?: RequestInit
) => Promise<Response>;

type PredictClientOptions = {
  /** Service root; `""` sends same-origin relative requests from a browser. */
  baseUrl: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
};

export type TransportErrorKind = "connection" | "timeout" | "http" | "malformed";

export class TransportError extends Error {
  readonly kind: TransportErrorKind;
  readonly url: string;
  readonly status: number | null;
  readonly detail: unknown;

  constructor(
    kind: TransportErrorKind,
    message: string,
    opts: { url: string; status?: number; detail?: unknown; cause?: unknown }
  ) {
    super(message, { cause: opts.cause });
    this.name = "TransportError";
    this.kind = kind;
    this.url = opts.url;
    this.status = opts.status ?? null;
    this.detail = opts.detail;
  }
}

const predictResponseSchema = z.object({
  predicted_category: z.union([z.literal(0), z.literal(1)]),
  risk_score_probability: z.number().min(0).max(1),
  risk_level: z.enum(["High Risk", "Low Risk"]),
});

const fieldErrorSchema = z.object({
  loc: z.array(z.union([z.string(), z.number()])),
  msg: z.string(),
  type: z.string(),
});

async function readJsonResponse(res: Response): Promise<unknown> {
  const text = await res.text();
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

/**
 * Pulls the human-readable part out of an error body:
 * `{ detail: ... }` from validation failures, `{ message: ... }` otherwise.
 */
function errorDetail(body: unknown): unknown {
  if (body && typeof body === "object") {
    if ("detail" in body && body.detail !== undefined) return body.detail;
    if ("message" in body && body.message !== undefined) return body.message;
  }
  return body;
}

function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === "AbortError";
}

export class PredictClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor({
    baseUrl,
    timeoutMs = 15000,
    fetchImpl = (input, init) => fetch(input, init),
  }: PredictClientOptions) {
    this.baseUrl = String(baseUrl || "").replace(/\/$/, "");
    this.timeoutMs = timeoutMs;
    this.fetchImpl = fetchImpl;
  }

  async requestJson(
    path: string,
    init: RequestInit = {}
  ): Promise<{ status: number; body: unknown }> {
    const url = `${this.baseUrl}${path}`;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    let res: Response;
    let body: unknown;
    try {
      res = await this.fetchImpl(url, {
        ...init,
        signal: controller.signal,
        headers: {
          ...(init.headers || {}),
          accept: "application/json",
        },
      });
      body = await readJsonResponse(res);
    } catch (err) {
      if (isAbortError(err)) {
        throw new TransportError(
          "timeout",
          `No response from ${url} within ${this.timeoutMs} ms`,
          { url, cause: err }
        );
      }
      throw new TransportError("connection", `Could not connect to ${url}`, {
        url,
        cause: err,
      });
    } finally {
      clearTimeout(timer);
    }

    if (!res.ok) {
      throw new TransportError(
        "http",
        `HTTP ${res.status} ${res.statusText}`.trim(),
        { url, status: res.status, detail: errorDetail(body) }
      );
    }
    return { status: res.status, body };
  }

  async predict(observation: ClinicalObservation): Promise<PredictResponse> {
    const { body } = await this.requestJson("/predict", {
      method: "POST",
      headers: {
        "content-type": "application/json",
      },
      body: JSON.stringify(observation),
    });

    const parsed = predictResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new TransportError(
        "malformed",
        "Prediction response has an unexpected shape",
        { url: `${this.baseUrl}/predict`, detail: body }
      );
    }
    return parsed.data;
  }

  async ping(): Promise<unknown> {
    const { body } = await this.requestJson("/", { method: "GET" });
    return body;
  }
}

function formatDetail(detail: unknown): string {
  if (typeof detail === "string" && detail.trim()) return detail;

  const fieldErrors = z.array(fieldErrorSchema).safeParse(detail);
  if (fieldErrors.success && fieldErrors.data.length > 0) {
    return fieldErrors.data
      .map((e) => {
        const field = e.loc.filter((part) => part !== "body").join(".");
        return field ? `${field}: ${e.msg}` : e.msg;
      })
      .join("; ");
  }

  return "No details available.";
}

/**
 * User-facing message for a failed prediction call.
 *
 * Never throws.
 */
export function describeTransportError(err: unknown): string {
  if (err instanceof TransportError) {
    switch (err.kind) {
      case "connection":
        return `Connection Error: could not connect to the prediction service at ${err.url}. Please make sure the server is running.`;
      case "timeout":
        return `Timeout: the prediction service did not respond in time (${err.url}).`;
      case "http":
        return `API Error: server returned ${err.status}. Details: ${formatDetail(err.detail)}`;
      case "malformed":
        return "API Error: the prediction service sent an unexpected response.";
    }
  }
  const message = err instanceof Error ? err.message : String(err);
  return `An unexpected error occurred: ${message}`;
}
