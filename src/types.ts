/**
 * Raw request body for `POST /predict`.
 *
 * Categorical inputs arrive as human-readable labels (the `_label` fields)
 * and fasting blood sugar arrives as a raw mg/dl reading (`fbs_raw`).
 * The codec turns these into the numeric codes the model expects.
 */
export type ClinicalObservation = {
  age: number;
  sex_label: string;
  cp_label: string;
  trestbps: number;
  chol: number;
  fbs_raw: number;
  restecg_label: string;
  thalachh: number;
  exang_label: string;
  oldpeak: number;
  slope: Slope;
  ca: VesselCount;
  thal_label: string;
};

export type Slope = 0 | 1 | 2;
export type VesselCount = 0 | 1 | 2 | 3;

/**
 * Observation after label mapping. Keys are the 13 model feature names.
 */
export type EncodedObservation = {
  age: number;
  sex: 0 | 1;
  cp: 0 | 1 | 2 | 3;
  trestbps: number;
  chol: number;
  fbs: 0 | 1;
  restecg: 0 | 1 | 2;
  thalachh: number;
  exang: 0 | 1;
  oldpeak: number;
  slope: Slope;
  ca: VesselCount;
  thal: 1 | 2 | 3;
};

export type FeatureName = keyof EncodedObservation;

/**
 * Positional feature values in model order. The model has no name binding,
 * only position.
 */
export type FeatureVector = readonly number[];

/**
 * One validation problem, shaped like the `detail` entries of a 422 body.
 */
export type FieldError = {
  loc: (string | number)[];
  msg: string;
  type: string;
};

export type RiskLevel = "High Risk" | "Low Risk";

export type PredictionResult = {
  predictedCategory: 0 | 1;
  probability: number;
  riskLevel: RiskLevel;
};

/**
 * The exact `200` payload of `POST /predict`.
 */
export type PredictResponse = {
  predicted_category: 0 | 1;
  risk_score_probability: number;
  risk_level: RiskLevel;
};
