import type { Slope, VesselCount } from "./types";

export type NumericFieldName =
  | "age"
  | "trestbps"
  | "chol"
  | "fbs_raw"
  | "thalachh"
  | "oldpeak";

export type LabelFieldName =
  | "sex_label"
  | "cp_label"
  | "restecg_label"
  | "exang_label"
  | "thal_label";

export type NumericDomain = {
  label: string;
  min: number;
  max: number;
  integer: boolean;
  step: number;
  defaultValue: number;
};

/**
 * Accepted ranges for numeric inputs.
 *
 * The codec builds its request schema from these and the form builds its
 * number inputs from them, so both sides always accept the same values.
 */
export const NUMERIC_FIELDS: Record<NumericFieldName, NumericDomain> = {
  age: {
    label: "Age (Years)",
    min: 25,
    max: 90,
    integer: true,
    step: 1,
    defaultValue: 50,
  },
  trestbps: {
    label: "Resting Blood Pressure (mm Hg)",
    min: 80,
    max: 250,
    integer: false,
    step: 5,
    defaultValue: 120,
  },
  chol: {
    label: "Serum Cholesterol (mg/dl)",
    min: 100,
    max: 600,
    integer: false,
    step: 10,
    defaultValue: 200,
  },
  fbs_raw: {
    label: "Fasting Blood Sugar (mg/dl)",
    min: 60,
    max: 150,
    integer: true,
    step: 1,
    defaultValue: 90,
  },
  thalachh: {
    label: "Max Heart Rate Achieved",
    min: 60,
    max: 220,
    integer: false,
    step: 5,
    defaultValue: 150,
  },
  oldpeak: {
    label: "Oldpeak (ST Depression)",
    min: 0,
    max: 6.5,
    integer: false,
    step: 0.1,
    defaultValue: 1,
  },
};

/**
 * Closed option sets for label inputs, in form display order.
 */
export const LABEL_OPTIONS: Record<LabelFieldName, readonly string[]> = {
  sex_label: ["Male", "Female"],
  cp_label: [
    "Typical angina",
    "Atypical angina",
    "Non-anginal pain",
    "Asymptomatic",
  ],
  restecg_label: ["Normal", "ST-T wave abnormality", "Left ventricular hypertrophy"],
  exang_label: ["No", "Yes"],
  thal_label: ["Normal", "Fixed defect", "Reversible defect"],
};

export const LABEL_TITLES: Record<LabelFieldName, string> = {
  sex_label: "Gender",
  cp_label: "Chest Pain Type",
  restecg_label: "Resting ECG Results",
  exang_label: "Exercise Induced Angina",
  thal_label: "Thalassemia Type",
};

export const SLOPE_OPTIONS: readonly Slope[] = [0, 1, 2];
export const CA_OPTIONS: readonly VesselCount[] = [0, 1, 2, 3];

// Threshold for the derived fasting blood sugar flag (mg/dl, exclusive).
export const FBS_THRESHOLD = 120;
