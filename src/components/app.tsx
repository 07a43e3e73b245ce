import React, { useState, useEffect, useRef, useCallback } from "react";
import { TrailCanvas } from "./trail-canvas";
import { TrailSession, SessionPhase, SessionStatus } from "../simulation/trail-session";
import { TrailSettingsInput } from "../simulation/trail-config";
import type { RendererMetrics } from "../types/renderer-types";
import { DEFAULT_STEPS_PER_SECOND, SPEED_OPTIONS, BG_COLOR, GRID_BG_COLOR } from "../constants";
import { hexColor, rgbaColor } from "../utils/color-utils";

/** Form fields in display order. */
const FIELDS: { key: keyof TrailSettingsInput; label: string }[] = [
  { key: "name", label: "Trail Name:" },
  { key: "size", label: "Grid Size:" },
  { key: "tortuosity", label: "Tortuosity (0-1):" },
  { key: "sparsity", label: "Sparsity (0-1):" },
  { key: "length", label: "Trail Length (0=max):" },
];

/** How long a download URL stays valid after the click that starts it. */
const REVOKE_DELAY_MS = 1000;

/** Offers `contents` to the browser as a file download. */
function downloadTextFile(fileName: string, contents: string): void {
  const url = URL.createObjectURL(new Blob([contents], { type: "text/plain" }));
  // Some browsers start reading the blob after click() returns.
  setTimeout(() => URL.revokeObjectURL(url), REVOKE_DELAY_MS);
  const link = document.createElement("a");
  link.href = url;
  link.download = fileName;
  document.body.appendChild(link);
  link.click();
  link.remove();
}

export const App = () => {
  const sessionRef = useRef(new TrailSession());
  const session = sessionRef.current;

  const [phase, setPhase] = useState<SessionPhase>(session.phase);
  const [form, setForm] = useState<TrailSettingsInput>(session.lastInput);
  const [inputError, setInputError] = useState<string | null>(null);
  const [saveMessage, setSaveMessage] = useState<string | null>(null);
  const [runId, setRunId] = useState(0);
  const [targetStepsPerSecond, setTargetStepsPerSecond] = useState(DEFAULT_STEPS_PER_SECOND);
  const [paused, setPaused] = useState(false);
  const [status, setStatus] = useState<SessionStatus | null>(null);
  const [metrics, setMetrics] = useState<RendererMetrics | null>(null);
  const [canvasSize, setCanvasSize] = useState({ width: 800, height: 600 });

  const controlsRef = useRef<HTMLDivElement>(null);

  const updateCanvasSize = useCallback(() => {
    const controlsHeight = controlsRef.current?.offsetHeight ?? 0;
    setCanvasSize({
      width: window.innerWidth,
      height: window.innerHeight - controlsHeight,
    });
  }, []);

  useEffect(() => {
    updateCanvasSize();
    window.addEventListener("resize", updateCanvasSize);
    return () => window.removeEventListener("resize", updateCanvasSize);
  }, [updateCanvasSize]);

  // The controls bar only exists outside the input phase.
  useEffect(() => {
    updateCanvasSize();
  }, [phase, updateCanvasSize]);

  const handleGenerate = () => {
    const result = session.start(form);
    if (!result.ok) {
      setInputError(result.error);
      return;
    }
    setInputError(null);
    setSaveMessage(null);
    setStatus(session.status());
    setPaused(false);
    setRunId(id => id + 1);
    setPhase(session.phase);
  };

  const handleStatus = useCallback((s: SessionStatus, m: RendererMetrics) => {
    setStatus(s);
    setMetrics(m);
  }, []);

  const handleFinished = useCallback(() => {
    setPhase(sessionRef.current.phase);
  }, []);

  const handleSave = () => {
    const exported = session.exportTrail();
    if (!exported) return;
    try {
      downloadTextFile(exported.fileName, exported.contents);
      setSaveMessage(`Trail saved successfully to ${exported.fileName}`);
    } catch (err) {
      console.error("Error saving file:", err);
      setSaveMessage(`Error saving file: ${err instanceof Error ? err.message : String(err)}`);
    }
  };

  const handleRestart = () => {
    session.restart();
    setForm(session.lastInput);
    setPhase(session.phase);
  };

  if (phase === "input") {
    return (
      <div className="app" style={{ background: hexColor(BG_COLOR) }}>
        <form className="settings" onSubmit={e => { e.preventDefault(); handleGenerate(); }}>
          <h1>Trail Generator Settings</h1>
          {FIELDS.map(({ key, label }) => (
            <label key={key}>
              {label}
              <input type="text" value={form[key]}
                onChange={e => setForm(f => ({ ...f, [key]: e.target.value }))} />
            </label>
          ))}
          <button type="submit">Generate Trail</button>
          {inputError && <div className="input-error" role="alert">{inputError}</div>}
        </form>
      </div>
    );
  }

  const statusParts: string[] = [];
  if (status) {
    const budget = status.maxSteps > 0 ? ` / ${status.maxSteps}` : "";
    statusParts.push(`Steps: ${status.stepCount}${budget}`);
    statusParts.push(`Marked cells: ${status.visitedCount}`);
    if (status.trapped) statusParts.push("Trapped");
  }
  if (metrics) {
    statusParts.push(`${Math.round(metrics.fps)} fps`);
  }

  return (
    <div className="app" style={{ background: hexColor(BG_COLOR) }}>
      <div className="controls" ref={controlsRef}>
        <button onClick={() => setPaused(p => !p)} disabled={phase === "finished"}>
          {paused ? "Play" : "Pause"}
        </button>
        <label>
          Speed: {targetStepsPerSecond} steps/s
          <select value={targetStepsPerSecond} onChange={e => setTargetStepsPerSecond(Number(e.target.value))}>
            {SPEED_OPTIONS.map(s => <option key={s} value={s}>{s} steps/s</option>)}
          </select>
        </label>
        {statusParts.length > 0 && <span className="status">{statusParts.join(" | ")}</span>}
      </div>
      <div className="canvas-container">
        <TrailCanvas
          key={runId}
          width={canvasSize.width}
          height={canvasSize.height}
          session={session}
          targetStepsPerSecond={targetStepsPerSecond}
          paused={paused}
          onStatus={handleStatus}
          onFinished={handleFinished}
        />
        {phase === "finished" && (
          <div className="finished-overlay" style={{ background: rgbaColor(GRID_BG_COLOR, 0.85) }}>
            <h2>Generation Finished</h2>
            <button onClick={handleSave}>Save Trail</button>
            <button onClick={handleRestart}>Restart</button>
            {saveMessage && <div className="save-message">{saveMessage}</div>}
          </div>
        )}
      </div>
    </div>
  );
};
