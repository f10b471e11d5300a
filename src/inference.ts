import { FEATURE_ORDER } from "./codec";
import type { RiskModel } from "./model";
import type {
  FeatureVector,
  PredictionResult,
  PredictResponse,
  RiskLevel,
} from "./types";

export const MODEL_NOT_LOADED = "Model not loaded.";

/**
 * Thrown for every prediction while the service runs without a model.
 */
export class ModelUnavailableError extends Error {
  constructor() {
    super(MODEL_NOT_LOADED);
    this.name = "ModelUnavailableError";
  }
}

/**
 * Thrown when the model answers with something that is not a binary class
 * or a probability.
 */
export class InferenceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InferenceError";
  }
}

export function riskLevelFor(category: 0 | 1): RiskLevel {
  return category === 1 ? "High Risk" : "Low Risk";
}

/**
 * Rounds to 4 decimals, ties to even.
 *
 * A double lands exactly halfway between two 4-decimal values only when it
 * is an odd multiple of 1/32; everything else is rounded on its exact value
 * by `toFixed`.
 */
export function roundProbability(p: number): number {
  const thirtySeconds = p * 32;
  if (Number.isInteger(thirtySeconds) && thirtySeconds % 2 === 1) {
    const below = Math.floor(p * 10000);
    return (below % 2 === 0 ? below : below + 1) / 10000;
  }
  return Number(p.toFixed(4));
}

function toBinaryCategory(label: number): 0 | 1 {
  if (label === 0) return 0;
  if (label === 1) return 1;
  throw new InferenceError(`Model returned unexpected class label: ${label}`);
}

/**
 * Runs the model for one encoded observation.
 *
 * Holds the process-wide model handle, which is never mutated. Constructed
 * with `null` when the artifact failed to load; `predict(...)` then fails
 * fast with `ModelUnavailableError` without touching the vector.
 */
export class InferenceGateway {
  private readonly model: RiskModel | null;

  constructor(model: RiskModel | null) {
    this.model = model;
  }

  get available(): boolean {
    return this.model !== null;
  }

  predict(features: FeatureVector): PredictionResult {
    if (!this.model) throw new ModelUnavailableError();

    if (features.length !== FEATURE_ORDER.length) {
      throw new InferenceError(
        `Expected ${FEATURE_ORDER.length} features, got ${features.length}`
      );
    }

    const predictedCategory = toBinaryCategory(this.model.classify(features));
    const probability = this.model.score(features);
    if (!Number.isFinite(probability) || probability < 0 || probability > 1) {
      throw new InferenceError(`Model returned invalid probability: ${probability}`);
    }

    return {
      predictedCategory,
      probability: roundProbability(probability),
      riskLevel: riskLevelFor(predictedCategory),
    };
  }
}

export function toPredictResponse(result: PredictionResult): PredictResponse {
  return {
    predicted_category: result.predictedCategory,
    risk_score_probability: result.probability,
    risk_level: result.riskLevel,
  };
}
