import { mkdir, rm } from "node:fs/promises";
import path from "node:path";
import type { CameraConfigT } from "@camhub/protocol";
import type { CaptureDevice } from "../modules/capture-device.js";
import type { Clock } from "../services/clock.js";
import type { LoggerLikeT } from "../services/logger.js";
import {
  createAlreadyActiveError,
  createDeviceError,
  createNotActiveError,
  isCameraError,
} from "./camera-errors.js";
import type { DeviceRegistry, DeviceTokenT } from "./device-registry.js";
import type { FinalizationPipeline } from "./finalization-pipeline.js";

/**
 * Upper bound between a stop request and the encoder being told to stop.
 * The signal itself is observed on the next tick; the remainder is the driver
 * flushing and terminating its encoder.
 */
export const STOP_LATENCY_BOUND_MS = 300;

export type RecordingPhaseT =
  | "idle"
  | "starting"
  | "recording"
  | "stopping"
  | "finalizing";

export type RecordingSnapshotT = {
  phase: RecordingPhaseT;
  requestedAt: number | null;
  startedAt: number | null;
  rawPath: string;
  stopRequestedAt: number | null;
};

export type RecordingSessionOptionsT = {
  registry: DeviceRegistry;
  pipeline: FinalizationPipeline;
  clock: Clock;
  logger: LoggerLikeT;
  rawPath: string;
  finalPath: string;
  rotation?: 0 | 180;
  onPhaseChange?: (phase: RecordingPhaseT) => void;
};

type SignalT = {
  promise: Promise<void>;
  resolve: () => void;
};

function createSignal(): SignalT {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

function formatDuration(ms: number): string {
  const seconds = ms / 1000;
  return `${seconds.toFixed(2)} seconds (${(seconds / 60).toFixed(2)} minutes)`;
}

/**
 * Recording session
 *
 * idle -> starting -> recording -> stopping -> finalizing -> idle
 *
 * start() returns once the device is writing the raw stream. Waiting for the
 * stop signal, shutting the device down and finalizing run on a background
 * worker so no request handler is held for the recording's duration.
 */
export class RecordingSession {
  private phase: RecordingPhaseT = "idle";
  private requestedAt: number | null = null;
  private startedAt: number | null = null;
  private stopRequestedAt: number | null = null;
  private stopSignal: SignalT | null = null;
  private startup: SignalT | null = null;
  private worker: Promise<void> | null = null;
  private readonly options: RecordingSessionOptionsT;

  constructor(options: RecordingSessionOptionsT) {
    this.options = options;
  }

  getPhase(): RecordingPhaseT {
    return this.phase;
  }

  isActive(): boolean {
    return this.phase === "starting" || this.phase === "recording";
  }

  /**
   * Recording time since the device began emitting, or 0
   */
  duration(): number {
    if (this.startedAt === null) {
      return 0;
    }
    return Math.max(0, this.options.clock.now() - this.startedAt);
  }

  snapshot(): RecordingSnapshotT {
    return {
      phase: this.phase,
      requestedAt: this.requestedAt,
      startedAt: this.startedAt,
      rawPath: this.options.rawPath,
      stopRequestedAt: this.stopRequestedAt,
    };
  }

  /**
   * Resolves once a start in progress has either failed or handed over to
   * the worker
   */
  async whenStarted(): Promise<void> {
    if (this.startup) {
      await this.startup.promise;
    }
  }

  /**
   * Resolves when the current worker (including finalization) has finished
   */
  async whenSettled(): Promise<void> {
    await this.whenStarted();
    if (this.worker) {
      await this.worker;
    }
  }

  /**
   * Start recording with the given configuration
   *
   * @throws CameraError ALREADY_ACTIVE when a recording is running or
   * finalizing, DEVICE_BUSY when another mode holds the device,
   * DEVICE_ERROR when the device fails to start
   */
  async start(config: CameraConfigT): Promise<void> {
    if (this.phase !== "idle") {
      throw createAlreadyActiveError();
    }

    const { registry, clock, logger, rawPath, finalPath } = this.options;
    const lease = registry.acquire("recording");
    const token = lease.token;

    this.requestedAt = clock.now();
    this.startedAt = null;
    this.stopRequestedAt = null;
    this.stopSignal = createSignal();
    const startup = createSignal();
    this.startup = startup;
    this.setPhase("starting");

    let device: CaptureDevice | null = null;
    try {
      await mkdir(path.dirname(rawPath), { recursive: true });
      await rm(rawPath, { force: true });
      await rm(finalPath, { force: true });

      logger.info(
        `[Recording] Initializing camera with config: ${config.width}x${config.height}@${config.fps}fps`
      );
      device = registry.deviceFor(token);
      await device.open();
      await device.configure({
        kind: "video",
        width: config.width,
        height: config.height,
        fps: config.fps,
        rotation: this.options.rotation ?? 180,
      });
      await device.start();
      await device.startRecording(rawPath);
    } catch (error) {
      logger.error(
        `[Recording] Failed to start: ${error instanceof Error ? error.message : String(error)}`
      );
      await this.closeQuietly(device);
      registry.release(token);
      this.reset();
      startup.resolve();
      if (isCameraError(error)) {
        throw error;
      }
      throw createDeviceError("start", error);
    }

    this.startedAt = clock.now();
    this.setPhase("recording");
    logger.info(
      `[Recording] Recording started at ${new Date(this.startedAt).toISOString()} -> ${rawPath}`
    );

    const stopSignal = this.stopSignal;
    this.worker = this.runWorker(token, device, stopSignal).catch((error) => {
      logger.error(
        `[Recording] Worker failed: ${error instanceof Error ? error.message : String(error)}`
      );
      this.reset();
    });
    startup.resolve();
  }

  /**
   * Ask the worker to stop. Returns immediately; the device is stopped by
   * the worker within STOP_LATENCY_BOUND_MS and finalization follows.
   *
   * @throws CameraError NOT_ACTIVE when no recording is running
   */
  requestStop(): void {
    if (!this.isActive() || !this.stopSignal || this.stopRequestedAt !== null) {
      throw createNotActiveError();
    }
    this.stopRequestedAt = this.options.clock.now();
    this.options.logger.info(
      `[Recording] Stop requested after ${formatDuration(this.duration())}`
    );
    this.stopSignal.resolve();
  }

  private async runWorker(
    token: DeviceTokenT,
    device: CaptureDevice,
    stopSignal: SignalT | null
  ): Promise<void> {
    const { registry, pipeline, logger, rawPath, finalPath } = this.options;

    if (stopSignal) {
      await stopSignal.promise;
    }

    this.setPhase("stopping");
    if (this.startedAt !== null) {
      logger.info(
        `[Recording] Recording stopped. Duration: ${formatDuration(this.duration())}`
      );
    } else {
      logger.warn("[Recording] Recording stopped but start time was not recorded");
    }

    try {
      await device.stopRecording();
      await device.stop();
      await device.close();
    } catch (error) {
      logger.error(
        `[Recording] Error while shutting down device: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
      await this.closeQuietly(device);
    }

    this.setPhase("finalizing");
    const job = await pipeline
      .run(token, rawPath, finalPath)
      .finally(() => this.reset());
    logger.info(`[Recording] Finalization ${job.state}`);
  }

  private async closeQuietly(device: CaptureDevice | null): Promise<void> {
    if (!device || !device.isOpen()) {
      return;
    }
    try {
      await device.close();
    } catch (error) {
      this.options.logger.error(
        `[Recording] Error closing camera: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  private reset(): void {
    this.requestedAt = null;
    this.startedAt = null;
    this.stopRequestedAt = null;
    this.stopSignal = null;
    this.setPhase("idle");
  }

  private setPhase(phase: RecordingPhaseT): void {
    if (this.phase === phase) {
      return;
    }
    this.phase = phase;
    this.options.onPhaseChange?.(phase);
  }
}
