import { Provenance } from "../models/Portfolio";
import { RecoverableFailure } from "../models/PipelineResult";

export type PipelineState =
  | "START"
  | "METRICS_COMPUTED"
  | "REQUEST_SENT"
  | "PARSED_OK"
  | "ADJUSTED_OK"
  | "FALLBACK"
  | "DONE";

export type PipelineLog = {
  requestId: string;
  state: PipelineState;
  provenance: Provenance | null;
  failureType: RecoverableFailure["type"] | null;
  detail: string | null;
  signal: "quality" | null;
  timestamp: string;
};

export function emitPipelineLog(log: Omit<PipelineLog, "timestamp" | "signal">): PipelineLog {
  const payload: PipelineLog = {
    ...log,
    signal: log.failureType === "constraint-repair" ? "quality" : null,
    timestamp: new Date().toISOString(),
  };

  // Repair failures are a model-quality signal.
  if (payload.signal === "quality") {
    console.warn(JSON.stringify(payload));
  } else {
    console.log(JSON.stringify(payload));
  }
  return payload;
}
