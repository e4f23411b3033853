import { describe, expect, it } from "vitest";
import type { FinalizationJobT, StreamingStatusT } from "@camhub/protocol";
import type { RecordingSnapshotT } from "./recording-session.js";
import { projectStatus } from "./status-projector.js";

const idleStreaming: StreamingStatusT = {
  active: false,
  subscribers: 0,
  initializing: false,
};

const idleRecording: RecordingSnapshotT = {
  phase: "idle",
  requestedAt: null,
  startedAt: null,
  rawPath: "video/camera_video.h264",
  stopRequestedAt: null,
};

const job: FinalizationJobT = {
  inputPath: "video/camera_video.h264",
  outputPath: "video/camera_video.mp4",
  startedAt: 5000,
  finishedAt: null,
  state: "running",
  failureDetail: null,
  outputBytes: null,
  stable: null,
};

describe("projectStatus", () => {
  it("reports idle with streaming and last job attached", () => {
    const lastJob: FinalizationJobT = {
      ...job,
      state: "succeeded",
      finishedAt: 6000,
      outputBytes: 16,
      stable: true,
    };

    expect(
      projectStatus({
        mode: "idle",
        recording: idleRecording,
        currentJob: null,
        lastJob,
        streaming: idleStreaming,
        now: 10_000,
      })
    ).toEqual({
      state: "idle",
      mode: "idle",
      streaming: idleStreaming,
      lastJob,
    });
  });

  it("reports recording duration rounded to a tenth of a second", () => {
    const status = projectStatus({
      mode: "recording",
      recording: {
        ...idleRecording,
        phase: "recording",
        requestedAt: 900,
        startedAt: 1000,
      },
      currentJob: null,
      lastJob: null,
      streaming: idleStreaming,
      now: 3460,
    });

    expect(status).toEqual({
      state: "recording",
      durationSeconds: 2.5,
      startTime: 1000,
      requestedAt: 900,
      mode: "recording",
      streaming: idleStreaming,
      lastJob: null,
    });
  });

  it("reports zero duration while the device is still starting", () => {
    const status = projectStatus({
      mode: "recording",
      recording: { ...idleRecording, phase: "starting", requestedAt: 900 },
      currentJob: null,
      lastJob: null,
      streaming: idleStreaming,
      now: 3460,
    });

    expect(status).toMatchObject({
      state: "recording",
      durationSeconds: 0,
      startTime: null,
    });
  });

  it("reports converting as soon as the stop is being processed", () => {
    const status = projectStatus({
      mode: "recording",
      recording: {
        ...idleRecording,
        phase: "stopping",
        requestedAt: 900,
        startedAt: 1000,
        stopRequestedAt: 4000,
      },
      currentJob: null,
      lastJob: null,
      streaming: idleStreaming,
      now: 4100,
    });

    expect(status).toMatchObject({ state: "converting", since: 4000 });
  });

  it("prefers converting over recording while a job runs", () => {
    const status = projectStatus({
      mode: "converting",
      recording: { ...idleRecording, phase: "finalizing", stopRequestedAt: 4000 },
      currentJob: job,
      lastJob: null,
      streaming: idleStreaming,
      now: 5500,
    });

    expect(status).toMatchObject({
      state: "converting",
      since: 5000,
      mode: "converting",
    });
  });
});
