export const DEFAULT_MODEL_PATHS = [
  "models/rf_pipeline.json",
  "rf_pipeline.json",
] as const;

export const DEFAULT_PORT = 3000;
export const DEFAULT_API_URL = `http://127.0.0.1:${DEFAULT_PORT}`;

export type ServiceConfig = {
  port: number;
  dev: boolean;
  /** Tried in order; relative paths resolve against the working directory. */
  modelPaths: string[];
  apiUrl: string;
};

/**
 * Reads service settings from the environment.
 *
 * - `PORT`: listen port (default 3000)
 * - `NODE_ENV`: anything but `production` runs Next.js in dev mode
 * - `HEART_RISK_MODEL_PATH`: replaces the first model candidate path
 * - `HEART_RISK_API_URL`: service URL used by the CLI in remote mode
 */
export function loadServiceConfig(
  env: Partial<NodeJS.ProcessEnv> = process.env
): ServiceConfig {
  const parsedPort = Number.parseInt(env.PORT || "", 10);
  const port =
    Number.isFinite(parsedPort) && parsedPort > 0 ? parsedPort : DEFAULT_PORT;

  const override = env.HEART_RISK_MODEL_PATH?.trim();
  const modelPaths = override
    ? [override, DEFAULT_MODEL_PATHS[1]]
    : [...DEFAULT_MODEL_PATHS];

  const apiUrl = (env.HEART_RISK_API_URL?.trim() || DEFAULT_API_URL).replace(
    /\/$/,
    ""
  );

  return {
    port,
    dev: env.NODE_ENV !== "production",
    modelPaths,
    apiUrl,
  };
}
