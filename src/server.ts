import next from "next";
import { createApp } from "./app";
import { loadServiceConfig } from "./config";
import { InferenceGateway } from "./inference";
import { loadModelFromCandidates } from "./model";

/**
 * Server entrypoint.
 *
 * 1) Read configuration from the environment.
 * 2) Load the model once; on failure keep serving in degraded mode.
 * 3) Prepare the Next.js form app.
 * 4) Mount the API routes, then let Next handle everything else.
 */
async function main(): Promise<void> {
  const config = loadServiceConfig();

  const loaded = loadModelFromCandidates(config.modelPaths);
  const gateway = new InferenceGateway(loaded ? loaded.model : null);

  const app = next({ dev: config.dev });
  const handle = app.getRequestHandler();
  await app.prepare();

  const server = createApp({
    gateway,
    fallback: (req, res) => {
      void handle(req, res);
    },
  });

  server.listen(config.port, () => {
    console.log(
      `Server ready on http://localhost:${config.port} (dev=${config.dev}, model=${
        loaded ? loaded.path : "none"
      })`
    );
    if (!gateway.available) {
      console.log("WARN: No model loaded; /predict answers 500 until restart.");
    }
    console.log(`Assessment form: http://localhost:${config.port}/assess`);
  });
}

main().catch((err) => {
  console.error("Fatal server error:", err);
  process.exit(1);
});
