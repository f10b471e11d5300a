import { useState } from "react";
import { PredictClient, describeTransportError } from "../src/client";
import {
  CA_OPTIONS,
  LABEL_OPTIONS,
  LABEL_TITLES,
  NUMERIC_FIELDS,
  SLOPE_OPTIONS,
  type LabelFieldName,
  type NumericFieldName,
} from "../src/domains";
import {
  defaultFormValues,
  formatProbability,
  inputStep,
  parseSlope,
  parseVesselCount,
  riskTone,
  toPredictRequest,
  type FormValues,
} from "../src/form";
import type { PredictResponse } from "../src/types";

// Same origin: the Express server that renders this page also serves /predict.
const client = new PredictClient({ baseUrl: "" });

const TONE_COLORS = {
  error: "crimson",
  success: "seagreen",
} as const;

const fieldStyle = { marginTop: 12 };

export default function Assess() {
  const [values, setValues] = useState<FormValues>(defaultFormValues);
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const [result, setResult] = useState<PredictResponse | null>(null);

  function setNumber(name: NumericFieldName, raw: string): void {
    setValues((v) => ({ ...v, [name]: Number(raw) }));
  }

  function setLabel(name: LabelFieldName, raw: string): void {
    setValues((v) => ({ ...v, [name]: raw }));
  }

  async function submit(): Promise<void> {
    setLoading(true);
    setError(null);
    setResult(null);

    try {
      setResult(await client.predict(toPredictRequest(values)));
    } catch (e) {
      setError(describeTransportError(e));
    } finally {
      setLoading(false);
    }
  }

  function numberInput(name: NumericFieldName) {
    const d = NUMERIC_FIELDS[name];
    return (
      <div style={fieldStyle} key={name}>
        <label>
          {d.label}
          <br />
          <input
            type="number"
            min={d.min}
            max={d.max}
            step={inputStep(d)}
            value={values[name]}
            onChange={(e) => setNumber(name, e.target.value)}
            style={{ width: 160 }}
          />
        </label>
      </div>
    );
  }

  function labelSelect(name: LabelFieldName) {
    return (
      <div style={fieldStyle} key={name}>
        <label>
          {LABEL_TITLES[name]}
          <br />
          <select value={values[name]} onChange={(e) => setLabel(name, e.target.value)}>
            {LABEL_OPTIONS[name].map((o) => (
              <option key={o} value={o}>
                {o}
              </option>
            ))}
          </select>
        </label>
      </div>
    );
  }

  const tone = result ? riskTone(result.risk_level) : null;

  return (
    <main>
      <h1>Heart Disease Risk Assessment</h1>
      <p>
        Enter the patient&apos;s clinical parameters to get a risk prediction
        from the deployed model.
      </p>

      <form
        onSubmit={(e) => {
          e.preventDefault();
          void submit();
        }}
      >
        <section>
          <h2>Patient and vitals</h2>
          {numberInput("age")}
          {labelSelect("sex_label")}
          {numberInput("trestbps")}
          {labelSelect("cp_label")}
          {numberInput("chol")}
          {numberInput("fbs_raw")}
        </section>

        <section style={{ marginTop: 24 }}>
          <h2>ECG, exercise and thalassemia</h2>
          {labelSelect("restecg_label")}
          {labelSelect("exang_label")}
          {numberInput("thalachh")}
          {numberInput("oldpeak")}
          {labelSelect("thal_label")}

          <div style={fieldStyle}>
            <label>
              Number of Major Vessels (0-3)
              <br />
              <select
                value={String(values.ca)}
                onChange={(e) => {
                  const ca = parseVesselCount(e.target.value);
                  if (ca !== null) setValues((v) => ({ ...v, ca }));
                }}
              >
                {CA_OPTIONS.map((o) => (
                  <option key={o} value={String(o)}>
                    {o}
                  </option>
                ))}
              </select>
            </label>
          </div>

          <div style={fieldStyle}>
            <label>
              Peak Exercise ST Segment Slope
              <br />
              <select
                value={String(values.slope)}
                onChange={(e) => {
                  const slope = parseSlope(e.target.value);
                  if (slope !== null) setValues((v) => ({ ...v, slope }));
                }}
              >
                {SLOPE_OPTIONS.map((o) => (
                  <option key={o} value={String(o)}>
                    {o}
                  </option>
                ))}
              </select>
            </label>
          </div>
        </section>

        <div style={{ marginTop: 24 }}>
          <button type="submit" disabled={loading}>
            {loading ? "Analyzing patient data…" : "Predict Heart Risk"}
          </button>
        </div>
      </form>

      <section style={{ marginTop: 24 }}>
        <h2>Prediction Results</h2>

        {error ? (
          <p style={{ color: "crimson" }}>
            Error: <code>{error}</code>
          </p>
        ) : null}

        {result && tone ? (
          <>
            <p style={{ color: TONE_COLORS[tone], fontWeight: "bold" }}>
              {tone === "error"
                ? `WARNING: ${result.risk_level} DETECTED`
                : `${result.risk_level} DETECTED`}
            </p>
            <ul>
              <li>
                Risk Assessment: <strong>{result.risk_level}</strong>
              </li>
              <li>
                Probability of High Risk:{" "}
                <strong>{formatProbability(result.risk_score_probability)}</strong>
              </li>
            </ul>
            <p>
              This prediction is generated by an ML model and is not a
              substitute for professional medical advice.
            </p>
          </>
        ) : error ? null : (
          <p>No prediction yet.</p>
        )}
      </section>
    </main>
  );
}
