import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import type {
  CameraConfigResponseT,
  CameraStatusResponseT,
  SetConfigResponseT,
  StartRecordingResponseT,
  StopRecordingResponseT,
  StopStreamingResponseT,
} from "@camhub/protocol";
import type { CaptureDeviceFactory } from "../modules/capture-device.js";
import { systemClock, type Clock } from "../services/clock.js";
import type { LoggerLikeT } from "../services/logger.js";
import type { WebSocketManager } from "../services/websocket-manager.js";
import {
  CameraConfigStore,
  toConfigResponse,
} from "./camera-config-store.js";
import {
  createConvertingError,
  createDeviceBusyError,
  createNotFoundError,
  createStillRecordingError,
} from "./camera-errors.js";
import { DeviceRegistry } from "./device-registry.js";
import { readFileSize, type FileSizeReader } from "./file-stability.js";
import { FinalizationPipeline } from "./finalization-pipeline.js";
import { RecordingSession } from "./recording-session.js";
import { projectStatus } from "./status-projector.js";
import {
  StreamMultiplexer,
  type StreamProfileT,
} from "./stream-multiplexer.js";
import type { Transcoder } from "./transcoder.js";

export const RAW_FILE_NAME = "camera_video.h264";
export const FINAL_FILE_NAME = "camera_video.mp4";
export const STILL_FILE_NAME = "still.jpg";

export type CameraPathsT = {
  raw: string;
  final: string;
  still: string;
};

export type CameraServiceOptionsT = {
  createDevice: CaptureDeviceFactory;
  transcoder: Transcoder;
  logger: LoggerLikeT;
  videoDir: string;
  clock?: Clock;
  notifier?: WebSocketManager;
  readSize?: FileSizeReader;
  stabilityIntervalMs?: number;
  streamingInitTimeoutMs?: number;
  streamProfile?: StreamProfileT;
  streamWarmupMs?: number;
  busyRecoveryDelayMs?: number;
  frameRetryDelayMs?: number;
};

export type StillImageT = {
  path: string;
  bytes: Buffer;
};

/**
 * Camera service
 *
 * Wires the registry, recording session, finalization pipeline and streaming
 * multiplexer together and exposes the operations the HTTP layer calls.
 * State changes are pushed to WebSocket subscribers.
 */
export class CameraService {
  readonly paths: CameraPathsT;
  private readonly registry: DeviceRegistry;
  private readonly pipeline: FinalizationPipeline;
  private readonly session: RecordingSession;
  private readonly multiplexer: StreamMultiplexer;
  private readonly configStore = new CameraConfigStore();
  private readonly clock: Clock;
  private readonly logger: LoggerLikeT;
  private readonly notifier?: WebSocketManager;
  private readonly readSize: FileSizeReader;

  constructor(options: CameraServiceOptionsT) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger;
    this.notifier = options.notifier;
    this.readSize = options.readSize ?? readFileSize;
    this.paths = {
      raw: path.join(options.videoDir, RAW_FILE_NAME),
      final: path.join(options.videoDir, FINAL_FILE_NAME),
      still: path.join(options.videoDir, STILL_FILE_NAME),
    };

    this.registry = new DeviceRegistry({
      createDevice: options.createDevice,
      logger: this.logger,
      streamingInitTimeoutMs: options.streamingInitTimeoutMs,
      now: () => this.clock.now(),
    });
    this.pipeline = new FinalizationPipeline({
      registry: this.registry,
      transcoder: options.transcoder,
      clock: this.clock,
      logger: this.logger,
      readSize: this.readSize,
      stabilityIntervalMs: options.stabilityIntervalMs,
      onJobChange: () => this.publishCameraStatus(),
    });
    this.session = new RecordingSession({
      registry: this.registry,
      pipeline: this.pipeline,
      clock: this.clock,
      logger: this.logger,
      rawPath: this.paths.raw,
      finalPath: this.paths.final,
      onPhaseChange: () => this.publishCameraStatus(),
    });
    this.multiplexer = new StreamMultiplexer({
      registry: this.registry,
      clock: this.clock,
      logger: this.logger,
      profile: options.streamProfile,
      warmupMs: options.streamWarmupMs,
      busyRecoveryDelayMs: options.busyRecoveryDelayMs,
      frameRetryDelayMs: options.frameRetryDelayMs,
      onStatusChange: (status) =>
        this.notifier?.broadcast("streaming", {
          type: "streaming.status",
          ...status,
        }),
    });
  }

  async startRecording(): Promise<StartRecordingResponseT> {
    const config = this.configStore.get();
    await this.session.start(config);
    return {
      accepted: true,
      resolution: `${config.width}x${config.height}`,
      fps: config.fps,
    };
  }

  requestStopRecording(): StopRecordingResponseT {
    this.session.requestStop();
    return { accepted: true };
  }

  getStatus(): CameraStatusResponseT {
    return projectStatus({
      mode: this.registry.currentMode(),
      recording: this.session.snapshot(),
      currentJob: this.pipeline.currentJob(),
      lastJob: this.pipeline.lastJob(),
      streaming: this.multiplexer.snapshot(),
      now: this.clock.now(),
    });
  }

  getConfig(): CameraConfigResponseT {
    return toConfigResponse(this.configStore.get());
  }

  /**
   * @throws CameraError DEVICE_BUSY unless the camera is idle,
   * INVALID_CONFIG for unsupported values
   */
  setConfig(body: unknown): SetConfigResponseT {
    const mode = this.registry.currentMode();
    if (mode !== "idle" || this.session.getPhase() !== "idle") {
      throw createDeviceBusyError(
        mode === "idle" ? "recording" : mode,
        "configuration can only change while the camera is idle"
      );
    }
    const config = this.configStore.update(body);
    this.logger.info(
      `[Config] Updated to ${config.width}x${config.height}@${config.fps}fps`
    );
    return { updated: true, config: toConfigResponse(config) };
  }

  /**
   * Path of the finished MP4
   *
   * @throws CameraError CONVERTING while finalization runs, NOT_FOUND when
   * no converted file exists
   */
  async resolveFinalDownload(): Promise<string> {
    const phase = this.session.getPhase();
    if (
      this.pipeline.isRunning() ||
      phase === "stopping" ||
      phase === "finalizing"
    ) {
      throw createConvertingError();
    }
    if ((await this.readSize(this.paths.final)) === null) {
      throw createNotFoundError("video file");
    }
    return this.paths.final;
  }

  /**
   * Path of the raw H.264 capture
   *
   * @throws CameraError STILL_RECORDING while recording, NOT_FOUND when no
   * raw file exists
   */
  async resolveRawDownload(): Promise<string> {
    if (this.session.isActive()) {
      throw createStillRecordingError();
    }
    if ((await this.readSize(this.paths.raw)) === null) {
      throw createNotFoundError("raw video file");
    }
    return this.paths.raw;
  }

  subscribe(signal?: AbortSignal): AsyncGenerator<Buffer, void, undefined> {
    return this.multiplexer.subscribe(signal);
  }

  async forceStopStreaming(): Promise<StopStreamingResponseT> {
    await this.multiplexer.forceStop();
    return { stopped: true };
  }

  /**
   * Capture a still JPEG from the shared streaming device and keep a copy
   * next to the recordings
   */
  async captureStill(): Promise<StillImageT> {
    const bytes = await this.multiplexer.captureStill();
    await mkdir(path.dirname(this.paths.still), { recursive: true });
    await writeFile(this.paths.still, bytes);
    this.logger.info(
      `[Camera] Still image saved to ${this.paths.still} (${bytes.length} bytes)`
    );
    return { path: this.paths.still, bytes };
  }

  /**
   * Resolves once the current recording (including finalization) finished
   */
  async whenSettled(): Promise<void> {
    await this.session.whenSettled();
  }

  /**
   * Stop streaming and any recording, then wait for finalization
   */
  async shutdown(): Promise<void> {
    await this.multiplexer.forceStop();
    await this.session.whenStarted();
    if (
      this.session.isActive() &&
      this.session.snapshot().stopRequestedAt === null
    ) {
      this.session.requestStop();
    }
    await this.session.whenSettled();
    await this.registry.closeLingeringHandles();
  }

  private publishCameraStatus(): void {
    if (!this.notifier) {
      return;
    }
    this.notifier.broadcast("camera", {
      type: "camera.status",
      ...this.getStatus(),
    });
  }
}
