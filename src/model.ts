import { readFileSync } from "node:fs";
import { z } from "zod";
import { FEATURE_ORDER } from "./codec";
import type { FeatureVector } from "./types";

/**
 * The only two capabilities the service needs from a trained classifier.
 *
 * Anything that can classify a feature vector and score the positive class
 * can stand in here; the codec and gateway never see the model technology.
 */
export interface RiskModel {
  /** Discrete class label for the vector. */
  classify(features: FeatureVector): number;
  /** Probability assigned to class `1`. */
  score(features: FeatureVector): number;
}

const LEAF = -1;

const treeSchema = z.object({
  childrenLeft: z.array(z.number().int()),
  childrenRight: z.array(z.number().int()),
  feature: z.array(z.number().int()),
  threshold: z.array(z.number()),
  value: z.array(z.array(z.number().nonnegative())),
});

type Tree = z.infer<typeof treeSchema>;

function checkTree(
  tree: Tree,
  nFeatures: number,
  nClasses: number,
  addIssue: (message: string) => void
): void {
  const n = tree.childrenLeft.length;
  if (n === 0) {
    addIssue("tree has no nodes");
    return;
  }

  const lengths = [
    tree.childrenRight.length,
    tree.feature.length,
    tree.threshold.length,
    tree.value.length,
  ];
  if (lengths.some((len) => len !== n)) {
    addIssue("node arrays have different lengths");
    return;
  }

  for (let i = 0; i < n; i += 1) {
    const left = tree.childrenLeft[i];
    const right = tree.childrenRight[i];

    if (left === LEAF || right === LEAF) {
      if (left !== right) {
        addIssue(`node ${i} has only one child`);
        return;
      }
      const dist = tree.value[i];
      if (dist.length !== nClasses) {
        addIssue(`leaf ${i} has ${dist.length} class weights, expected ${nClasses}`);
        return;
      }
      if (!(dist.reduce((a, b) => a + b, 0) > 0)) {
        addIssue(`leaf ${i} has an empty class distribution`);
        return;
      }
      continue;
    }

    // Children must point forward, which also rules out cycles.
    if (left <= i || right <= i || left >= n || right >= n) {
      addIssue(`node ${i} has out-of-order children`);
      return;
    }
    const f = tree.feature[i];
    if (f < 0 || f >= nFeatures) {
      addIssue(`node ${i} splits on unknown feature ${f}`);
      return;
    }
  }
}

/**
 * Serialized random forest, as exported from the training environment.
 *
 * Each tree is stored as flat node arrays. A node is a leaf when both child
 * indices are `-1`; otherwise the walk goes left when
 * `x[feature] <= threshold`.
 */
export const forestArtifactSchema = z
  .object({
    format: z.literal("random-forest"),
    classes: z.array(z.number().int()).min(2),
    nFeatures: z.number().int().positive(),
    featureNames: z.array(z.string()).optional(),
    trees: z.array(treeSchema).min(1),
  })
  .superRefine((artifact, ctx) => {
    if (!artifact.classes.includes(1)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["classes"],
        message: "classes must include the positive class 1",
      });
    }
    if (new Set(artifact.classes).size !== artifact.classes.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["classes"],
        message: "classes must be unique",
      });
    }
    if (artifact.nFeatures !== FEATURE_ORDER.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["nFeatures"],
        message: `expected ${FEATURE_ORDER.length} features, got ${artifact.nFeatures}`,
      });
    }
    const names = artifact.featureNames;
    if (
      names &&
      (names.length !== FEATURE_ORDER.length ||
        names.some((name, i) => name !== FEATURE_ORDER[i]))
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["featureNames"],
        message: `feature names must be ${FEATURE_ORDER.join(", ")}`,
      });
    }

    artifact.trees.forEach((tree, t) => {
      checkTree(tree, artifact.nFeatures, artifact.classes.length, (message) =>
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["trees", t], message })
      );
    });
  });

export type ForestArtifact = z.infer<typeof forestArtifactSchema>;

function findLeaf(tree: Tree, features: FeatureVector): number {
  let node = 0;
  while (tree.childrenLeft[node] !== LEAF) {
    node =
      features[tree.feature[node]] <= tree.threshold[node]
        ? tree.childrenLeft[node]
        : tree.childrenRight[node];
  }
  return node;
}

export class ForestModel implements RiskModel {
  private readonly classes: readonly number[];
  private readonly trees: readonly Tree[];
  private readonly nFeatures: number;
  private readonly positiveIndex: number;

  constructor(artifact: ForestArtifact) {
    this.classes = [...artifact.classes];
    this.trees = artifact.trees;
    this.nFeatures = artifact.nFeatures;
    this.positiveIndex = artifact.classes.indexOf(1);
  }

  /**
   * Parses and validates an artifact. Throws `SyntaxError` for malformed
   * JSON and `ZodError` for a well-formed but unusable artifact.
   */
  static fromJson(text: string): ForestModel {
    const raw: unknown = JSON.parse(text);
    return new ForestModel(forestArtifactSchema.parse(raw));
  }

  /**
   * Mean of the normalised leaf distributions across all trees, in the
   * artifact's class order.
   */
  predictProba(features: FeatureVector): number[] {
    if (features.length !== this.nFeatures) {
      throw new Error(
        `Expected ${this.nFeatures} features, got ${features.length}`
      );
    }

    const totals = this.classes.map(() => 0);
    for (const tree of this.trees) {
      const dist = tree.value[findLeaf(tree, features)];
      const sum = dist.reduce((a, b) => a + b, 0);
      dist.forEach((w, i) => {
        totals[i] += w / sum;
      });
    }
    return totals.map((t) => t / this.trees.length);
  }

  // Ties go to the earlier class.
  classify(features: FeatureVector): number {
    const proba = this.predictProba(features);
    let best = 0;
    for (let i = 1; i < proba.length; i += 1) {
      if (proba[i] > proba[best]) best = i;
    }
    return this.classes[best];
  }

  score(features: FeatureVector): number {
    return this.predictProba(features)[this.positiveIndex];
  }
}

export type LoadedModel = { model: RiskModel; path: string };

function describeLoadError(err: unknown): string {
  if (err instanceof z.ZodError) {
    const first = err.issues[0];
    const where = first.path.length ? `${first.path.join(".")}: ` : "";
    return `invalid artifact (${where}${first.message})`;
  }
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * Loads the model from the first candidate path that yields a valid artifact.
 *
 * Returns `null` when every candidate fails; the service then runs in
 * degraded mode and `/predict` reports the model as unavailable.
 */
export function loadModelFromCandidates(
  paths: readonly string[],
  readFile: (path: string) => string = (p) => readFileSync(p, "utf8")
): LoadedModel | null {
  for (const path of paths) {
    try {
      const model = ForestModel.fromJson(readFile(path));
      console.log(`INFO: Model loaded successfully from ${path}`);
      return { model, path };
    } catch (err) {
      console.warn(
        `WARN: Could not load model from ${path}: ${describeLoadError(err)}`
      );
    }
  }

  console.error(
    `FATAL ERROR: Model file not found (tried ${paths.join(", ")}). /predict will report the model as unavailable.`
  );
  return null;
}
