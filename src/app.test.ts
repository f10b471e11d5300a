import { afterEach, describe, expect, test, vi } from "vitest";
import { createApp, type AppOptions } from "./app";
import { InferenceGateway } from "./inference";
import type { RiskModel } from "./model";
import {
  REFERENCE_OBSERVATION,
  listen,
  recordingModel,
  type RunningServer,
} from "./test-utils";

let running: RunningServer | null = null;

async function start(model: RiskModel | null, fallback?: AppOptions["fallback"]) {
  running = await listen(
    createApp({ gateway: new InferenceGateway(model), fallback })
  );
  return running.baseUrl;
}

function postJson(url: string, body: unknown): Promise<Response> {
  return fetch(url, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body),
  });
}

afterEach(async () => {
  vi.restoreAllMocks();
  if (running) await running.close();
  running = null;
});

describe("GET /", () => {
  test("returns the acknowledgement", async () => {
    const base = await start(null);
    const res = await fetch(`${base}/`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      message: "Heart disease risk prediction service is running.",
    });
  });
});

describe("POST /predict", () => {
  test("encodes the observation and returns the verdict", async () => {
    const { model, seen } = recordingModel(1, 0.55);
    const base = await start(model);

    const res = await postJson(`${base}/predict`, REFERENCE_OBSERVATION);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      predicted_category: 1,
      risk_score_probability: 0.55,
      risk_level: "High Risk",
    });
    expect(seen).toEqual([[63, 1, 3, 145, 233, 1, 2, 150, 0, 2.3, 0, 0, 2]]);
  });

  test("low risk verdict for class 0", async () => {
    const base = await start(recordingModel(0, 0.23456).model);
    const res = await postJson(`${base}/predict`, REFERENCE_OBSERVATION);
    expect(await res.json()).toEqual({
      predicted_category: 0,
      risk_score_probability: 0.2346,
      risk_level: "Low Risk",
    });
  });

  test("out-of-range age never reaches the model", async () => {
    const { model, seen } = recordingModel(1, 0.9);
    const base = await start(model);

    const res = await postJson(`${base}/predict`, { ...REFERENCE_OBSERVATION, age: 10 });
    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({
      detail: [
        {
          loc: ["body", "age"],
          msg: "Input should be greater than or equal to 25",
          type: "too_small",
        },
      ],
    });
    expect(seen).toHaveLength(0);
  });

  test("unknown label is a client error", async () => {
    const base = await start(recordingModel(1, 0.9).model);
    const res = await postJson(`${base}/predict`, {
      ...REFERENCE_OBSERVATION,
      sex_label: "Unknown",
    });
    expect(res.status).toBe(422);
    const body = await res.json();
    expect(body.detail[0].loc).toEqual(["body", "sex_label"]);
  });

  test("reports the model as not loaded", async () => {
    const base = await start(null);
    const res = await postJson(`${base}/predict`, REFERENCE_OBSERVATION);
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ message: "Model not loaded." });
  });

  test("validation runs before the model availability check", async () => {
    const base = await start(null);
    const res = await postJson(`${base}/predict`, { ...REFERENCE_OBSERVATION, ca: 7 });
    expect(res.status).toBe(422);
  });

  test("rejects a body that is not JSON", async () => {
    const base = await start(recordingModel(1, 0.5).model);
    const res = await fetch(`${base}/predict`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: "{age: 63",
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      detail: [
        {
          loc: ["body"],
          msg: "Request body must be valid JSON.",
          type: "json_invalid",
        },
      ],
    });
  });

  test("an oversized body is a client error, not a server error", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const { model, seen } = recordingModel(1, 0.5);
    const base = await start(model);

    const res = await postJson(`${base}/predict`, {
      ...REFERENCE_OBSERVATION,
      notes: "x".repeat(200_000),
    });
    expect(res.status).toBe(413);
    expect(await res.json()).toEqual({
      detail: [
        {
          loc: ["body"],
          msg: "request entity too large",
          type: "entity.too.large",
        },
      ],
    });
    expect(seen).toHaveLength(0);
    expect(error).not.toHaveBeenCalled();
  });

  test("an unsupported charset is a client error", async () => {
    const base = await start(recordingModel(1, 0.5).model);
    const res = await fetch(`${base}/predict`, {
      method: "POST",
      headers: { "content-type": "application/json; charset=koi8-r" },
      body: JSON.stringify(REFERENCE_OBSERVATION),
    });
    expect(res.status).toBe(415);
    const body = await res.json();
    expect(body.detail[0].type).toBe("charset.unsupported");
  });

  test("a failing model turns into a 500", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const broken: RiskModel = {
      classify() {
        throw new Error("boom");
      },
      score() {
        return 0;
      },
    };
    const base = await start(broken);

    const res = await postJson(`${base}/predict`, REFERENCE_OBSERVATION);
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ message: "Internal server error." });
    expect(error).toHaveBeenCalledTimes(1);
  });
});

describe("fallback handler", () => {
  test("serves routes the API does not own", async () => {
    const base = await start(null, (_req, res) => {
      res.status(200).send("form page");
    });
    const res = await fetch(`${base}/assess`);
    expect(res.status).toBe(200);
    expect(await res.text()).toBe("form page");
  });
});
