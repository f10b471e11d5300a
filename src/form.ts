import {
  CA_OPTIONS,
  LABEL_OPTIONS,
  NUMERIC_FIELDS,
  SLOPE_OPTIONS,
  type NumericDomain,
} from "./domains";
import type { ClinicalObservation, Slope, VesselCount } from "./types";

/**
 * Form state. Same shape as the request body; the inputs are constrained by
 * the shared domains, so a submitted form is normally valid server-side.
 */
export type FormValues = ClinicalObservation;

export type RiskTone = "error" | "success";

export function defaultFormValues(): FormValues {
  return {
    age: NUMERIC_FIELDS.age.defaultValue,
    sex_label: "Male",
    cp_label: "Asymptomatic",
    trestbps: NUMERIC_FIELDS.trestbps.defaultValue,
    chol: NUMERIC_FIELDS.chol.defaultValue,
    fbs_raw: NUMERIC_FIELDS.fbs_raw.defaultValue,
    restecg_label: LABEL_OPTIONS.restecg_label[0],
    thalachh: NUMERIC_FIELDS.thalachh.defaultValue,
    exang_label: "No",
    oldpeak: NUMERIC_FIELDS.oldpeak.defaultValue,
    slope: 1,
    ca: 0,
    thal_label: LABEL_OPTIONS.thal_label[0],
  };
}

/**
 * Builds the request body from form state: exactly the 13 fields, nothing
 * else the form may carry.
 */
export function toPredictRequest(values: FormValues): ClinicalObservation {
  return {
    age: values.age,
    sex_label: values.sex_label,
    cp_label: values.cp_label,
    trestbps: values.trestbps,
    chol: values.chol,
    fbs_raw: values.fbs_raw,
    restecg_label: values.restecg_label,
    thalachh: values.thalachh,
    exang_label: values.exang_label,
    oldpeak: values.oldpeak,
    slope: values.slope,
    ca: values.ca,
    thal_label: values.thal_label,
  };
}

// Select values arrive as strings.
/**
 * `step` attribute for a number input. Integer fields step by whole numbers;
 * for the rest the domain step is only a hint, so any in-range value submits.
 */
export function inputStep(domain: NumericDomain): number | "any" {
  return domain.integer ? domain.step : "any";
}

export function parseSlope(raw: string): Slope | null {
  return SLOPE_OPTIONS.find((o) => String(o) === raw) ?? null;
}

export function parseVesselCount(raw: string): VesselCount | null {
  return CA_OPTIONS.find((o) => String(o) === raw) ?? null;
}

/**
 * `"error"` for a high-risk verdict, `"success"` otherwise.
 */
export function riskTone(riskLevel: string): RiskTone {
  return riskLevel === "High Risk" ? "error" : "success";
}

export function formatProbability(p: number): string {
  return `${(p * 100).toFixed(2)}%`;
}
