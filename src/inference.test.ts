import { describe, expect, test } from "vitest";
import {
  InferenceError,
  InferenceGateway,
  ModelUnavailableError,
  riskLevelFor,
  roundProbability,
  toPredictResponse,
} from "./inference";
import { recordingModel } from "./test-utils";

const VECTOR = [63, 1, 3, 145, 233, 1, 2, 150, 0, 2.3, 0, 0, 2];

describe("InferenceGateway", () => {
  test("maps class 1 to High Risk and rounds the probability", () => {
    const { model, seen } = recordingModel(1, 0.876543);
    const gateway = new InferenceGateway(model);
    expect(gateway.available).toBe(true);

    expect(gateway.predict(VECTOR)).toEqual({
      predictedCategory: 1,
      probability: 0.8765,
      riskLevel: "High Risk",
    });
    expect(seen).toEqual([VECTOR]);
  });

  test("maps class 0 to Low Risk", () => {
    const gateway = new InferenceGateway(recordingModel(0, 0.12344).model);
    expect(gateway.predict(VECTOR)).toEqual({
      predictedCategory: 0,
      probability: 0.1234,
      riskLevel: "Low Risk",
    });
  });

  test("fails fast without a model", () => {
    const gateway = new InferenceGateway(null);
    expect(gateway.available).toBe(false);
    expect(() => gateway.predict(VECTOR)).toThrow(ModelUnavailableError);
    expect(() => gateway.predict(VECTOR)).toThrow("Model not loaded.");
  });

  test("rejects a vector of the wrong length before calling the model", () => {
    const { model, seen } = recordingModel(1, 0.5);
    const gateway = new InferenceGateway(model);
    expect(() => gateway.predict(VECTOR.slice(0, 12))).toThrow(InferenceError);
    expect(seen).toHaveLength(0);
  });

  test("rejects a non-binary class label", () => {
    const gateway = new InferenceGateway(recordingModel(2, 0.5).model);
    expect(() => gateway.predict(VECTOR)).toThrow(
      "Model returned unexpected class label: 2"
    );
  });

  test("rejects a probability outside [0, 1]", () => {
    const gateway = new InferenceGateway(recordingModel(1, 1.5).model);
    expect(() => gateway.predict(VECTOR)).toThrow(InferenceError);
  });
});

describe("roundProbability", () => {
  test("rounds to four decimals", () => {
    expect(roundProbability(0.876543)).toBe(0.8765);
    expect(roundProbability(0.23456)).toBe(0.2346);
    expect(roundProbability(0.55)).toBe(0.55);
    expect(roundProbability(1)).toBe(1);
    expect(roundProbability(0)).toBe(0);
  });

  test("exact halves go to the even neighbour", () => {
    expect(roundProbability(1 / 32)).toBe(0.0312);
    expect(roundProbability(3 / 32)).toBe(0.0938);
    expect(roundProbability(5 / 32)).toBe(0.1562);
    expect(roundProbability(31 / 32)).toBe(0.9688);
  });

  test("a forest mean on a half is reported rounded to even", () => {
    const gateway = new InferenceGateway(recordingModel(0, 0.03125).model);
    expect(gateway.predict(VECTOR).probability).toBe(0.0312);
  });
});

describe("toPredictResponse", () => {
  test("uses the wire field names", () => {
    expect(
      toPredictResponse({
        predictedCategory: 1,
        probability: 0.55,
        riskLevel: riskLevelFor(1),
      })
    ).toEqual({
      predicted_category: 1,
      risk_score_probability: 0.55,
      risk_level: "High Risk",
    });
  });
});
