import express from "express";
import { encodeObservation, toFeatureVector } from "./codec";
import {
  InferenceGateway,
  MODEL_NOT_LOADED,
  ModelUnavailableError,
  toPredictResponse,
} from "./inference";

export const HOME_MESSAGE = "Heart disease risk prediction service is running.";

export type AppOptions = {
  gateway: InferenceGateway;
  /** Mounted after the API routes, e.g. the Next.js request handler. */
  fallback?: express.RequestHandler;
};

function isBodyParseError(err: unknown): boolean {
  return (
    err instanceof SyntaxError &&
    "status" in err &&
    err.status === 400
  );
}

type ClientError = { status: number; message: string; type: string };

/**
 * Request errors raised by body parsing (too large, bad charset or encoding).
 * body-parser marks them with a 4xx `status` and `expose: true`.
 */
function asClientError(err: unknown): ClientError | null {
  if (!(err instanceof Error)) return null;
  const status = "status" in err ? err.status : undefined;
  const expose = "expose" in err ? err.expose : undefined;
  if (typeof status !== "number" || status < 400 || status > 499) return null;
  if (expose !== true) return null;

  const type = "type" in err && typeof err.type === "string" ? err.type : "client_error";
  return { status, message: err.message, type };
}

export function createApp({ gateway, fallback }: AppOptions): express.Express {
  const app = express();
  app.use(express.json());

  // GET / -> static acknowledgement
  app.get("/", (_req, res) => {
    res.json({ message: HOME_MESSAGE });
  });

  // POST /predict -> validate, encode, classify
  app.post("/predict", (req, res, next) => {
    const encoded = encodeObservation(req.body);
    if (!encoded.valid) {
      res.status(422).json({ detail: encoded.errors });
      return;
    }

    try {
      const result = gateway.predict(toFeatureVector(encoded.value));
      res.json(toPredictResponse(result));
    } catch (err) {
      if (err instanceof ModelUnavailableError) {
        res.status(500).json({ message: MODEL_NOT_LOADED });
        return;
      }
      next(err);
    }
  });

  if (fallback) app.all("*", fallback);

  const onError: express.ErrorRequestHandler = (err, req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    if (isBodyParseError(err)) {
      res.status(400).json({
        detail: [
          {
            loc: ["body"],
            msg: "Request body must be valid JSON.",
            type: "json_invalid",
          },
        ],
      });
      return;
    }

    const clientError = asClientError(err);
    if (clientError) {
      res.status(clientError.status).json({
        detail: [{ loc: ["body"], msg: clientError.message, type: clientError.type }],
      });
      return;
    }

    console.error(`Unhandled error on ${req.method} ${req.path}:`, err);
    res.status(500).json({ message: "Internal server error." });
  };
  app.use(onError);

  return app;
}
