import { z } from "zod";
import {
  FBS_THRESHOLD,
  NUMERIC_FIELDS,
  type NumericFieldName,
} from "./domains";
import type {
  ClinicalObservation,
  EncodedObservation,
  FeatureName,
  FeatureVector,
  FieldError,
} from "./types";

/**
 * Feature order of the trained model. Binding is positional, so this order
 * must never change for an existing artifact.
 */
export const FEATURE_ORDER: readonly FeatureName[] = [
  "age",
  "sex",
  "cp",
  "trestbps",
  "chol",
  "fbs",
  "restecg",
  "thalachh",
  "exang",
  "oldpeak",
  "slope",
  "ca",
  "thal",
];

/**
 * Tagged result of a single label mapping.
 */
export type Mapped<T> =
  | { valid: true; value: T }
  | { valid: false; value: null; error: string };

export type EncodeResult =
  | { valid: true; value: Readonly<EncodedObservation> }
  | { valid: false; errors: FieldError[] };

function numberField(name: NumericFieldName) {
  const d = NUMERIC_FIELDS[name];
  const base = z.number({
    invalid_type_error: d.integer
      ? "Input should be a valid integer"
      : "Input should be a valid number",
  });
  const checked = d.integer
    ? base.int({ message: "Input should be a valid integer" })
    : base;
  return checked
    .min(d.min, { message: `Input should be greater than or equal to ${d.min}` })
    .max(d.max, { message: `Input should be less than or equal to ${d.max}` });
}

function labelField() {
  return z.string({ invalid_type_error: "Input should be a valid string" });
}

function literalErrorMap(expected: string): z.ZodErrorMap {
  return () => ({ message: `Input should be ${expected}` });
}

const observationSchema = z.object(
  {
    age: numberField("age"),
    sex_label: labelField(),
    cp_label: labelField(),
    trestbps: numberField("trestbps"),
    chol: numberField("chol"),
    fbs_raw: numberField("fbs_raw"),
    restecg_label: labelField(),
    thalachh: numberField("thalachh"),
    exang_label: labelField(),
    oldpeak: numberField("oldpeak"),
    slope: z.union([z.literal(0), z.literal(1), z.literal(2)], {
      errorMap: literalErrorMap("0, 1 or 2"),
    }),
    ca: z.union([z.literal(0), z.literal(1), z.literal(2), z.literal(3)], {
      errorMap: literalErrorMap("0, 1, 2 or 3"),
    }),
    thal_label: labelField(),
  },
  { invalid_type_error: "Input should be a valid object" }
);

const CHEST_PAIN_CODES = new Map<string, EncodedObservation["cp"]>([
  ["Typical angina", 0],
  ["Atypical angina", 1],
  ["Non-anginal pain", 2],
  ["Asymptomatic", 3],
]);

const REST_ECG_CODES = new Map<string, EncodedObservation["restecg"]>([
  ["Normal", 0],
  ["ST-T wave abnormality", 1],
  ["Left ventricular hypertrophy", 2],
]);

// 1-indexed: 0 is not a valid thal code for the model.
const THAL_CODES = new Map<string, EncodedObservation["thal"]>([
  ["Normal", 1],
  ["Fixed defect", 2],
  ["Reversible defect", 3],
]);

function ok<T>(value: T): Mapped<T> {
  return { valid: true, value };
}

function fail(error: string): Mapped<never> {
  return { valid: false, value: null, error };
}

/**
 * Maps the gender label (case-insensitive) to `1` for male, `0` for female.
 */
export function mapSex(label: string): Mapped<EncodedObservation["sex"]> {
  const l = label.toLowerCase();
  if (l === "male") return ok(1);
  if (l === "female") return ok(0);
  return fail("Invalid gender label: must be 'Male' or 'Female'.");
}

/**
 * Maps the chest pain label. Exact match only.
 */
export function mapChestPain(label: string): Mapped<EncodedObservation["cp"]> {
  const code = CHEST_PAIN_CODES.get(label);
  if (code === undefined) return fail(`Invalid chest pain label: '${label}'.`);
  return ok(code);
}

export function mapRestEcg(
  label: string
): Mapped<EncodedObservation["restecg"]> {
  const code = REST_ECG_CODES.get(label);
  if (code === undefined) return fail(`Invalid resting ECG label: '${label}'.`);
  return ok(code);
}

/**
 * Maps the exercise angina label (case-insensitive) to `1`/`0`.
 */
export function mapExerciseAngina(
  label: string
): Mapped<EncodedObservation["exang"]> {
  const l = label.toLowerCase();
  if (l === "yes") return ok(1);
  if (l === "no") return ok(0);
  return fail("Invalid exercise angina label: must be 'Yes' or 'No'.");
}

export function mapThal(label: string): Mapped<EncodedObservation["thal"]> {
  const code = THAL_CODES.get(label);
  if (code === undefined) return fail(`Invalid thalassemia label: '${label}'.`);
  return ok(code);
}

/**
 * Fasting blood sugar flag: `1` when the raw reading is above 120 mg/dl.
 */
export function deriveFbs(fbsRaw: number): EncodedObservation["fbs"] {
  return fbsRaw > FBS_THRESHOLD ? 1 : 0;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toFieldError(issue: z.ZodIssue, input: unknown): FieldError {
  const field = issue.path[0];
  const missing =
    typeof field === "string" && isRecord(input) && input[field] === undefined;

  return {
    loc: ["body", ...issue.path],
    msg: missing ? "Field required" : issue.message,
    type: missing ? "missing" : issue.code,
  };
}

function mappingError<T>(field: string, m: Mapped<T>): FieldError[] {
  if (m.valid) return [];
  return [{ loc: ["body", field], msg: m.error, type: "value_error" }];
}

/**
 * Maps an already range-checked observation to model codes.
 *
 * Every label is mapped even when an earlier one fails, so the caller gets
 * all label errors at once.
 */
export function encodeValidated(obs: ClinicalObservation): EncodeResult {
  const sex = mapSex(obs.sex_label);
  const cp = mapChestPain(obs.cp_label);
  const restecg = mapRestEcg(obs.restecg_label);
  const exang = mapExerciseAngina(obs.exang_label);
  const thal = mapThal(obs.thal_label);

  if (sex.valid && cp.valid && restecg.valid && exang.valid && thal.valid) {
    return {
      valid: true,
      value: Object.freeze({
        age: obs.age,
        sex: sex.value,
        cp: cp.value,
        trestbps: obs.trestbps,
        chol: obs.chol,
        fbs: deriveFbs(obs.fbs_raw),
        restecg: restecg.value,
        thalachh: obs.thalachh,
        exang: exang.value,
        oldpeak: obs.oldpeak,
        slope: obs.slope,
        ca: obs.ca,
        thal: thal.value,
      }),
    };
  }

  return {
    valid: false,
    errors: [
      ...mappingError("sex_label", sex),
      ...mappingError("cp_label", cp),
      ...mappingError("restecg_label", restecg),
      ...mappingError("exang_label", exang),
      ...mappingError("thal_label", thal),
    ],
  };
}

export type ParseResult =
  | { valid: true; value: ClinicalObservation }
  | { valid: false; errors: FieldError[] };

/**
 * Shape and range checks only. Reports every violation; labels are not
 * looked at beyond being strings.
 */
export function parseObservation(input: unknown): ParseResult {
  const parsed = observationSchema.safeParse(input);
  if (!parsed.success) {
    return {
      valid: false,
      errors: parsed.error.issues.map((issue) => toFieldError(issue, input)),
    };
  }
  return { valid: true, value: parsed.data };
}

/**
 * Validates and encodes an untrusted request body.
 *
 * Two stages:
 * 1) `parseObservation(...)`. No label mapping runs when it fails.
 * 2) Label mapping via `encodeValidated(...)`.
 */
export function encodeObservation(input: unknown): EncodeResult {
  const parsed = parseObservation(input);
  if (!parsed.valid) return parsed;
  return encodeValidated(parsed.value);
}

export function toFeatureVector(
  encoded: Readonly<EncodedObservation>
): FeatureVector {
  return Object.freeze(FEATURE_ORDER.map((name) => encoded[name]));
}
