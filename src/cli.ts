import { readFileSync } from "node:fs";
import { PredictClient, describeTransportError } from "./client";
import { encodeObservation, parseObservation, toFeatureVector } from "./codec";
import { loadServiceConfig } from "./config";
import { InferenceGateway, toPredictResponse } from "./inference";
import { loadModelFromCandidates } from "./model";
import type { FieldError, PredictResponse } from "./types";

/**
 * Reads a flag value from argv.
 *
 * Supports both styles:
 * - `--input obs.json`
 * - `--input=obs.json`
 *
 * Returns `null` if the flag is not present or has no value.
 */
function getArgValue(flag: string): string | null {
  const idx = process.argv.findIndex(
    (a) => a === flag || a.startsWith(`${flag}=`)
  );
  if (idx === -1) return null;
  const a = process.argv[idx];
  if (a.includes("=")) return a.split("=").slice(1).join("=");
  const next = process.argv[idx + 1];
  return next && !next.startsWith("--") ? next : null;
}

function hasFlag(flag: string): boolean {
  return process.argv.some((a) => a === flag || a.startsWith(`${flag}=`));
}

class CliError extends Error {}

function formatFieldErrors(errors: FieldError[]): string {
  const lines = errors.map(
    (e) => `  ${e.loc.filter((part) => part !== "body").join(".") || "body"}: ${e.msg}`
  );
  return `Invalid observation:\n${lines.join("\n")}`;
}

function readObservation(path: string): unknown {
  try {
    return JSON.parse(readFileSync(path, "utf8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new CliError(`Could not read observation from ${path}: ${reason}`);
  }
}

/**
 * Remote mode: the service does the label mapping, so only the shape and
 * ranges are checked before sending.
 */
async function predictRemote(
  apiUrl: string,
  input: unknown
): Promise<PredictResponse> {
  const parsed = parseObservation(input);
  if (!parsed.valid) throw new CliError(formatFieldErrors(parsed.errors));

  const client = new PredictClient({ baseUrl: apiUrl });
  try {
    return await client.predict(parsed.value);
  } catch (err) {
    throw new CliError(describeTransportError(err));
  }
}

function predictLocal(
  modelPath: string | null,
  input: unknown
): PredictResponse {
  const encoded = encodeObservation(input);
  if (!encoded.valid) throw new CliError(formatFieldErrors(encoded.errors));

  const paths = modelPath ? [modelPath] : loadServiceConfig().modelPaths;
  const loaded = loadModelFromCandidates(paths);
  if (!loaded) throw new CliError("Model not loaded.");

  const gateway = new InferenceGateway(loaded.model);
  return toPredictResponse(gateway.predict(toFeatureVector(encoded.value)));
}

/**
 * CLI entrypoint.
 *
 * Scores one observation (a JSON file with the `/predict` body fields):
 * - `--url <base>` or `--remote` (uses `HEART_RISK_API_URL`): call the service
 * - otherwise: load the model locally (`--model <path>` or the configured
 *   candidates) and predict in-process
 *
 * Prints the `/predict` response JSON.
 */
export async function runCli(): Promise<void> {
  const inputPath = getArgValue("--input");
  if (!inputPath) {
    throw new CliError(
      "Usage: npm run predict -- --input observation.json [--url http://host:port | --remote] [--model path]"
    );
  }

  const input = readObservation(inputPath);
  const url =
    getArgValue("--url") ||
    (hasFlag("--remote") ? loadServiceConfig().apiUrl : null);

  const result = url
    ? await predictRemote(url, input)
    : predictLocal(getArgValue("--model"), input);

  console.log(JSON.stringify(result, null, 2));
}

runCli().catch((err) => {
  if (err instanceof CliError) {
    console.error(err.message);
  } else {
    console.error("Fatal error:", err);
  }
  process.exit(1);
});
