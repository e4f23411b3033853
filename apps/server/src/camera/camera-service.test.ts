import { readFile } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { RecordingStateT } from "@camhub/protocol";
import {
  MOCK_H264_HEADER,
  MOCK_H264_TRAILER,
  MOCK_JPEG_FRAME,
  MockCameraHardware,
} from "../modules/mock/mock-capture-device.js";
import { WebSocketManager } from "../services/websocket-manager.js";
import { FakeClock } from "../test-utils/fake-clock.js";
import { FAKE_MP4, FakeTranscoder } from "../test-utils/fake-transcoder.js";
import {
  catchError,
  createTempDir,
  silentLogger,
} from "../test-utils/test-env.js";
import { CameraErrorCode } from "./camera-errors.js";
import { CameraService } from "./camera-service.js";

describe("CameraService", () => {
  let dir: string;
  let cleanup: () => Promise<void>;
  let hardware: MockCameraHardware;
  let clock: FakeClock;
  let transcoder: FakeTranscoder;
  let notifier: WebSocketManager;
  let service: CameraService;
  let cameraStates: RecordingStateT[];
  let duringTranscode: Promise<unknown> | null;

  beforeEach(async () => {
    ({ dir, cleanup } = await createTempDir());
    hardware = new MockCameraHardware();
    clock = new FakeClock();
    duringTranscode = null;
    transcoder = new FakeTranscoder({
      onTranscode: () => {
        duringTranscode = service.resolveFinalDownload().catch((error) => error);
      },
    });
    cameraStates = [];
    notifier = new WebSocketManager();
    const client = {
      send: (data: string) => {
        const message: unknown = JSON.parse(data);
        if (
          message &&
          typeof message === "object" &&
          "state" in message &&
          (message.state === "idle" ||
            message.state === "recording" ||
            message.state === "converting")
        ) {
          cameraStates.push(message.state);
        }
      },
    };
    notifier.add(client);
    notifier.update(client, "subscribe", ["camera"]);
    service = new CameraService({
      createDevice: hardware.createDevice,
      transcoder,
      logger: silentLogger,
      videoDir: path.join(dir, "video"),
      clock,
      notifier,
    });
  });

  afterEach(async () => {
    await service.shutdown();
    await cleanup();
  });

  function distinctStates(): RecordingStateT[] {
    return cameraStates.filter(
      (state, index) => index === 0 || cameraStates[index - 1] !== state
    );
  }

  it("records, converts and serves the final file", async () => {
    service.setConfig({ width: 1280, height: 720, fps: 30 });

    await expect(service.startRecording()).resolves.toEqual({
      accepted: true,
      resolution: "1280x720",
      fps: 30,
    });
    clock.advance(2000);

    expect(service.getStatus()).toMatchObject({
      state: "recording",
      durationSeconds: 2,
      mode: "recording",
    });

    expect(service.requestStopRecording()).toEqual({ accepted: true });
    await service.whenSettled();

    expect(service.getStatus()).toMatchObject({
      state: "idle",
      mode: "idle",
      lastJob: { state: "succeeded", outputBytes: FAKE_MP4.length, stable: true },
    });
    expect(distinctStates()).toEqual(["recording", "converting", "idle"]);

    const finalPath = await service.resolveFinalDownload();
    expect(finalPath).toBe(path.join(dir, "video", "camera_video.mp4"));
    expect(await readFile(finalPath)).toEqual(FAKE_MP4);

    const rawPath = await service.resolveRawDownload();
    expect(await readFile(rawPath)).toEqual(
      Buffer.concat([MOCK_H264_HEADER, MOCK_H264_TRAILER])
    );
  });

  it("keeps the raw file downloadable when conversion fails", async () => {
    service = new CameraService({
      createDevice: hardware.createDevice,
      transcoder: new FakeTranscoder({
        failWith: { exitCode: 1, detail: "moov atom not found" },
      }),
      logger: silentLogger,
      videoDir: path.join(dir, "video"),
      clock,
    });

    await service.startRecording();
    service.requestStopRecording();
    await service.whenSettled();

    expect(service.getStatus()).toMatchObject({
      state: "idle",
      mode: "idle",
      lastJob: {
        state: "failed",
        failureDetail: "Transcoder exited with code 1: moov atom not found",
      },
    });
    await expect(service.resolveFinalDownload()).rejects.toMatchObject({
      code: CameraErrorCode.NOT_FOUND,
    });
    const rawPath = await service.resolveRawDownload();
    expect(rawPath).toBe(path.join(dir, "video", "camera_video.h264"));
    expect(await readFile(rawPath)).toEqual(
      Buffer.concat([MOCK_H264_HEADER, MOCK_H264_TRAILER])
    );
  });

  it("reports CONVERTING for the final download while the transcoder runs", async () => {
    await service.startRecording();
    service.requestStopRecording();
    await service.whenSettled();

    expect(await duringTranscode).toMatchObject({
      code: CameraErrorCode.CONVERTING,
      message: "Video is converting, please wait.",
    });
  });

  it("rejects a second start while recording", async () => {
    await service.startRecording();

    await expect(service.startRecording()).rejects.toMatchObject({
      code: CameraErrorCode.ALREADY_ACTIVE,
    });
    expect(hardware.opens).toBe(1);
  });

  it("rejects a stop when nothing records", () => {
    expect(catchError(() => service.requestStopRecording())).toMatchObject({
      code: CameraErrorCode.NOT_ACTIVE,
    });
  });

  it("has nothing to download before the first recording", async () => {
    await expect(service.resolveFinalDownload()).rejects.toMatchObject({
      code: CameraErrorCode.NOT_FOUND,
      message: "No video file available.",
    });
    await expect(service.resolveRawDownload()).rejects.toMatchObject({
      code: CameraErrorCode.NOT_FOUND,
      message: "No raw video file available.",
    });
  });

  it("refuses the raw download while recording", async () => {
    await service.startRecording();

    await expect(service.resolveRawDownload()).rejects.toMatchObject({
      code: CameraErrorCode.STILL_RECORDING,
    });
  });

  it("shares one device open between two stream subscribers", async () => {
    const first = service.subscribe();
    const second = service.subscribe();

    await Promise.all([first.next(), second.next()]);

    expect(hardware.opens).toBe(1);
    expect(service.getStatus()).toMatchObject({
      state: "idle",
      mode: "streaming",
      streaming: { active: true, subscribers: 2, initializing: false },
    });

    await first.return();
    await second.return();

    expect(hardware.closes).toBe(1);
    expect(service.getStatus().mode).toBe("idle");
  });

  it("keeps streaming off the device while a recording holds it", async () => {
    await service.startRecording();

    await expect(service.subscribe().next()).rejects.toMatchObject({
      code: CameraErrorCode.DEVICE_BUSY,
      details: { heldBy: "recording" },
    });
    await expect(service.captureStill()).rejects.toMatchObject({
      code: CameraErrorCode.DEVICE_BUSY,
    });
    expect(hardware.opens).toBe(1);
    expect(service.getStatus().state).toBe("recording");
  });

  it("keeps recording and configuration changes off the device while streaming", async () => {
    const stream = service.subscribe();
    await stream.next();

    await expect(service.startRecording()).rejects.toMatchObject({
      code: CameraErrorCode.DEVICE_BUSY,
      details: { heldBy: "streaming" },
    });
    expect(catchError(() => service.setConfig({ fps: 25 }))).toMatchObject({
      code: CameraErrorCode.DEVICE_BUSY,
    });
    expect(service.getConfig().fps).toBe(30);

    await stream.return();
  });

  it("ends every subscriber on a forced stop", async () => {
    const stream = service.subscribe();
    await stream.next();

    await expect(service.forceStopStreaming()).resolves.toEqual({
      stopped: true,
    });

    await expect(stream.next()).resolves.toEqual({
      done: true,
      value: undefined,
    });
    expect(hardware.closes).toBe(1);
    expect(service.getStatus().streaming).toEqual({
      active: false,
      subscribers: 0,
      initializing: false,
    });
  });

  it("captures a still and releases the device", async () => {
    const still = await service.captureStill();

    expect(still.path).toBe(path.join(dir, "video", "still.jpg"));
    expect(still.bytes).toEqual(MOCK_JPEG_FRAME);
    expect(await readFile(still.path)).toEqual(MOCK_JPEG_FRAME);
    expect(hardware.opens).toBe(1);
    expect(hardware.closes).toBe(1);
    expect(service.getStatus().mode).toBe("idle");
  });

  it("applies a new configuration to the next recording", async () => {
    expect(service.setConfig({ width: 640, height: 480, fps: 25 })).toEqual({
      updated: true,
      config: {
        format: "mp4",
        width: 640,
        height: 480,
        resolution: "640x480",
        fps: 25,
      },
    });

    await service.startRecording();

    expect(hardware.devices[0]?.profile).toEqual({
      kind: "video",
      width: 640,
      height: 480,
      fps: 25,
      rotation: 180,
    });
  });

  it("stops an active recording and finalizes it on shutdown", async () => {
    await service.startRecording();

    await service.shutdown();

    expect(service.getStatus()).toMatchObject({
      state: "idle",
      mode: "idle",
      lastJob: { state: "succeeded" },
    });
    expect(transcoder.calls).toHaveLength(1);
  });

  it("waits for a recording that is still starting before shutting down", async () => {
    const releaseOpen = hardware.holdOpens();
    const starting = service.startRecording();

    const shuttingDown = service.shutdown();
    releaseOpen();
    await shuttingDown;

    expect(service.getStatus()).toMatchObject({
      state: "idle",
      mode: "idle",
      lastJob: { state: "succeeded" },
    });
    expect(transcoder.calls).toHaveLength(1);
    expect(hardware.openHandles).toBe(0);
    await expect(starting).resolves.toMatchObject({ accepted: true });
  });
});
