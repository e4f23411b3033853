import type {
  CameraStatusResponseT,
  CaptureModeT,
  FinalizationJobT,
  StreamingStatusT,
} from "@camhub/protocol";
import type { RecordingSnapshotT } from "./recording-session.js";

export type StatusInputsT = {
  mode: CaptureModeT;
  recording: RecordingSnapshotT;
  currentJob: FinalizationJobT | null;
  lastJob: FinalizationJobT | null;
  streaming: StreamingStatusT;
  now: number;
};

function roundToTenth(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * Project internal state onto the externally visible status
 *
 * converting wins over recording, recording over idle. A session that is
 * stopping or finalizing already reports converting so the status never
 * flickers back to idle between the device stopping and the job starting.
 */
export function projectStatus(inputs: StatusInputsT): CameraStatusResponseT {
  const { mode, recording, currentJob, lastJob, streaming, now } = inputs;
  const common = { mode, streaming, lastJob };

  if (
    currentJob?.state === "running" ||
    recording.phase === "stopping" ||
    recording.phase === "finalizing"
  ) {
    return {
      state: "converting",
      since: currentJob?.startedAt ?? recording.stopRequestedAt,
      ...common,
    };
  }

  if (
    (recording.phase === "starting" || recording.phase === "recording") &&
    recording.requestedAt !== null
  ) {
    const elapsedMs =
      recording.startedAt === null ? 0 : Math.max(0, now - recording.startedAt);
    return {
      state: "recording",
      durationSeconds: roundToTenth(elapsedMs / 1000),
      startTime: recording.startedAt,
      requestedAt: recording.requestedAt,
      ...common,
    };
  }

  return { state: "idle", ...common };
}
