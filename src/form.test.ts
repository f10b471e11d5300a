import { describe, expect, test } from "vitest";
import { encodeObservation } from "./codec";
import { NUMERIC_FIELDS, type NumericFieldName } from "./domains";
import {
  defaultFormValues,
  formatProbability,
  inputStep,
  parseSlope,
  parseVesselCount,
  riskTone,
  toPredictRequest,
} from "./form";

describe("form values", () => {
  test("defaults encode without errors", () => {
    const r = encodeObservation(toPredictRequest(defaultFormValues()));
    expect(r.valid).toBe(true);
  });

  test("defaults", () => {
    expect(defaultFormValues()).toEqual({
      age: 50,
      sex_label: "Male",
      cp_label: "Asymptomatic",
      trestbps: 120,
      chol: 200,
      fbs_raw: 90,
      restecg_label: "Normal",
      thalachh: 150,
      exang_label: "No",
      oldpeak: 1,
      slope: 1,
      ca: 0,
      thal_label: "Normal",
    });
  });

  test("request carries only the 13 body fields", () => {
    const values = { ...defaultFormValues(), submittedAt: "now" };
    const request = toPredictRequest(values);
    expect(Object.keys(request)).toEqual([
      "age",
      "sex_label",
      "cp_label",
      "trestbps",
      "chol",
      "fbs_raw",
      "restecg_label",
      "thalachh",
      "exang_label",
      "oldpeak",
      "slope",
      "ca",
      "thal_label",
    ]);
  });

  test("select values parse to enum members", () => {
    expect(parseSlope("2")).toBe(2);
    expect(parseSlope("3")).toBeNull();
    expect(parseVesselCount("3")).toBe(3);
    expect(parseVesselCount("x")).toBeNull();
  });
});

describe("number input steps", () => {
  const names: NumericFieldName[] = [
    "age",
    "trestbps",
    "chol",
    "fbs_raw",
    "thalachh",
    "oldpeak",
  ];

  test("integer fields step by one from their minimum", () => {
    expect(inputStep(NUMERIC_FIELDS.age)).toBe(1);
    expect(inputStep(NUMERIC_FIELDS.fbs_raw)).toBe(1);
  });

  test("other fields accept any in-range value", () => {
    expect(inputStep(NUMERIC_FIELDS.trestbps)).toBe("any");
    expect(inputStep(NUMERIC_FIELDS.chol)).toBe("any");
    expect(inputStep(NUMERIC_FIELDS.thalachh)).toBe("any");
    expect(inputStep(NUMERIC_FIELDS.oldpeak)).toBe("any");
  });

  test("every field's step admits every value the codec accepts", () => {
    for (const name of names) {
      const d = NUMERIC_FIELDS[name];
      const step = inputStep(d);
      if (step === "any") continue;
      expect(d.integer).toBe(true);
      expect(step).toBe(1);
      expect(Number.isInteger(d.min)).toBe(true);
    }
  });

  test("off-step values from the form still encode", () => {
    const r = encodeObservation(
      toPredictRequest({
        ...defaultFormValues(),
        trestbps: 123,
        chol: 233,
        oldpeak: 2.35,
      })
    );
    expect(r.valid).toBe(true);
  });
});

describe("result rendering", () => {
  test("tone follows the risk level", () => {
    expect(riskTone("High Risk")).toBe("error");
    expect(riskTone("Low Risk")).toBe("success");
  });

  test("probability is shown as a percentage", () => {
    expect(formatProbability(0.55)).toBe("55.00%");
    expect(formatProbability(0.1234)).toBe("12.34%");
    expect(formatProbability(1)).toBe("100.00%");
  });
});
