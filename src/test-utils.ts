import type { Server } from "node:http";
import type express from "express";
import type { RiskModel } from "./model";
import type { FeatureVector } from "./types";

export const REFERENCE_OBSERVATION = {
  age: 63,
  sex_label: "Male",
  cp_label: "Asymptomatic",
  trestbps: 145,
  chol: 233,
  fbs_raw: 150,
  restecg_label: "Left ventricular hypertrophy",
  thalachh: 150,
  exang_label: "No",
  oldpeak: 2.3,
  slope: 0,
  ca: 0,
  thal_label: "Fixed defect",
} as const;

/**
 * Model stub that answers with fixed values and records every vector.
 */
export function recordingModel(label: number, probability: number) {
  const seen: FeatureVector[] = [];
  const model: RiskModel = {
    classify(features) {
      seen.push(features);
      return label;
    },
    score() {
      return probability;
    },
  };
  return { model, seen };
}

export type RunningServer = {
  baseUrl: string;
  close: () => Promise<void>;
};

/**
 * Starts the app on an ephemeral loopback port.
 */
export function listen(app: express.Express): Promise<RunningServer> {
  return new Promise((resolve, reject) => {
    const server: Server = app.listen(0, "127.0.0.1", () => {
      const addr = server.address();
      if (!addr || typeof addr === "string") {
        reject(new Error("Server has no TCP address"));
        return;
      }
      resolve({
        baseUrl: `http://127.0.0.1:${addr.port}`,
        close: () =>
          new Promise<void>((done, fail) => {
            server.close((err) => (err ? fail(err) : done()));
          }),
      });
    });
    server.on("error", reject);
  });
}
