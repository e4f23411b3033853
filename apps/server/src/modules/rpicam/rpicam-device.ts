import { spawn, type ChildProcessByStdio } from "node:child_process";
import type { Readable } from "node:stream";
import {
  createDeviceBusyError,
  createDeviceError,
  createFrameCaptureError,
  type CameraError,
} from "../../camera/camera-errors.js";
import type { LoggerLikeT } from "../../services/logger.js";
import {
  isDeviceBusyMessage,
  type CaptureDevice,
  type CaptureProfileT,
} from "../capture-device.js";
import { JpegFrameParser } from "./jpeg-frame-parser.js";
import {
  buildMjpegArgs,
  buildRecordingArgs,
  resolveRpicamCandidates,
} from "./rpicam-args.js";

const MAX_STDERR_CHARS = 8 * 1024;

/**
 * Process timings. A capture process still running after `startupGraceMs`
 * has the camera.
 */
export type RpicamTimingsT = {
  startupGraceMs: number;
  stopSigtermAfterMs: number;
  stopSigkillAfterMs: number;
  frameTimeoutMs: number;
};

export const DEFAULT_RPICAM_TIMINGS: RpicamTimingsT = {
  startupGraceMs: 500,
  stopSigtermAfterMs: 1500,
  stopSigkillAfterMs: 3000,
  frameTimeoutMs: 3000,
};

type CaptureProcessT = ChildProcessByStdio<null, Readable, Readable>;

type FrameWaiterT = {
  resolve: (frame: Buffer) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
};

function isSpawnNotFound(error: unknown): boolean {
  return (
    error instanceof Error && "code" in error && error.code === "ENOENT"
  );
}

/**
 * Raspberry Pi camera controller
 *
 * Drives the camera through the rpicam-vid (or legacy libcamera-vid) CLI.
 * The video profile writes H.264 straight into the raw file; the mjpeg
 * profile reads JPEG frames from the process's stdout. The camera is held
 * exactly as long as a capture process runs.
 */
export class RpicamDevice implements CaptureDevice {
  readonly name = "rpicam";
  private opened = false;
  private profile: CaptureProfileT | null = null;
  private child: CaptureProcessT | null = null;
  private stderr = "";
  private waiters: FrameWaiterT[] = [];
  private readonly parser = new JpegFrameParser();
  private readonly logger: LoggerLikeT;
  private readonly timings: RpicamTimingsT;

  constructor(logger: LoggerLikeT, timings: Partial<RpicamTimingsT> = {}) {
    this.logger = logger;
    this.timings = { ...DEFAULT_RPICAM_TIMINGS, ...timings };
  }

  async open(): Promise<void> {
    if (this.opened) {
      throw createDeviceError("open", "device is already open");
    }
    this.opened = true;
  }

  async configure(profile: CaptureProfileT): Promise<void> {
    this.assertOpen("configure");
    if (this.child) {
      throw createDeviceError("configure", "cannot reconfigure while capturing");
    }
    this.profile = profile;
  }

  async start(): Promise<void> {
    const profile = this.requireProfile("start");
    // video capture starts once the output path is known
    if (profile.kind === "mjpeg") {
      await this.launch(buildMjpegArgs(profile));
    }
  }

  async startRecording(outputPath: string): Promise<void> {
    const profile = this.requireProfile("startRecording");
    if (profile.kind !== "video") {
      throw createDeviceError("startRecording", "device is not in video mode");
    }
    await this.launch(buildRecordingArgs(profile, outputPath));
  }

  async stopRecording(): Promise<void> {
    await this.terminate();
  }

  captureFrame(): Promise<Buffer> {
    if (!this.child || this.profile?.kind !== "mjpeg") {
      return Promise.reject(createFrameCaptureError("capture process not running"));
    }
    const { frameTimeoutMs } = this.timings;
    return new Promise<Buffer>((resolve, reject) => {
      const waiter: FrameWaiterT = {
        resolve,
        reject,
        timer: setTimeout(() => {
          this.waiters = this.waiters.filter((w) => w !== waiter);
          reject(createFrameCaptureError(`no frame within ${frameTimeoutMs}ms`));
        }, frameTimeoutMs),
      };
      this.waiters.push(waiter);
    });
  }

  async stop(): Promise<void> {
    await this.terminate();
  }

  async close(): Promise<void> {
    await this.terminate();
    this.opened = false;
    this.profile = null;
  }

  /**
   * False once the capture process died on its own; callers must reopen
   */
  isOpen(): boolean {
    return this.opened;
  }

  private async launch(args: string[]): Promise<void> {
    const candidates = resolveRpicamCandidates();
    for (const binary of candidates) {
      try {
        await this.spawnCapture(binary, args);
        return;
      } catch (error) {
        if (isSpawnNotFound(error)) {
          this.logger.warn(`[Rpicam] ${binary} not found, trying next candidate`);
          continue;
        }
        throw error;
      }
    }
    throw createDeviceError(
      "start",
      `no capture binary found (tried ${candidates.join(", ")})`
    );
  }

  private spawnCapture(binary: string, args: string[]): Promise<void> {
    this.logger.info(`[Rpicam] ${binary} ${args.join(" ")}`);
    this.stderr = "";
    this.parser.reset();

    const child = spawn(binary, args, { stdio: ["ignore", "pipe", "pipe"] });

    return new Promise<void>((resolve, reject) => {
      let settled = false;

      const grace = setTimeout(() => {
        settled = true;
        this.child = child;
        resolve();
      }, this.timings.startupGraceMs);

      child.stderr.on("data", (data: Buffer) => {
        if (this.stderr.length < MAX_STDERR_CHARS) {
          this.stderr += data.toString();
        }
      });

      child.stdout.on("data", (chunk: Buffer) => {
        this.deliverFrames(chunk);
      });

      child.once("error", (error) => {
        if (!settled) {
          settled = true;
          clearTimeout(grace);
          reject(error);
          return;
        }
        this.logger.error(`[Rpicam] Capture process error: ${error.message}`);
      });

      // close, not exit: stderr must be drained before it is inspected
      child.once("close", (code, signal) => {
        const failure = this.describeExit(binary, code, signal);
        if (!settled) {
          settled = true;
          clearTimeout(grace);
          reject(failure);
          return;
        }
        if (this.child === child) {
          this.logger.error(`[Rpicam] Capture process died: ${failure.message}`);
          this.child = null;
          this.opened = false;
          this.profile = null;
          this.failWaiters(failure);
        }
      });
    });
  }

  /**
   * SIGINT lets rpicam flush the encoder; escalate if it does not exit
   */
  private async terminate(): Promise<void> {
    const child = this.child;
    if (!child) {
      return;
    }
    this.child = null;

    const exited = new Promise<void>((resolve) => {
      if (child.exitCode !== null || child.signalCode !== null) {
        resolve();
        return;
      }
      child.once("exit", () => resolve());
    });

    child.kill("SIGINT");
    const escalate = setTimeout(() => {
      this.logger.warn("[Rpicam] Capture process ignored SIGINT, sending SIGTERM");
      child.kill("SIGTERM");
    }, this.timings.stopSigtermAfterMs);
    const kill = setTimeout(() => {
      this.logger.error("[Rpicam] Capture process ignored SIGTERM, sending SIGKILL");
      child.kill("SIGKILL");
    }, this.timings.stopSigkillAfterMs);

    try {
      await exited;
    } finally {
      clearTimeout(escalate);
      clearTimeout(kill);
    }
    this.failWaiters(createFrameCaptureError("capture stopped"));
  }

  private deliverFrames(chunk: Buffer): void {
    const frame = this.parser.push(chunk).at(-1);
    if (!frame || this.waiters.length === 0) {
      return;
    }
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      clearTimeout(waiter.timer);
      waiter.resolve(frame);
    }
  }

  private failWaiters(error: Error): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      clearTimeout(waiter.timer);
      waiter.reject(error);
    }
  }

  private describeExit(
    binary: string,
    code: number | null,
    signal: NodeJS.Signals | null
  ): CameraError {
    const detail = this.stderr.trim();
    if (isDeviceBusyMessage(detail)) {
      const lastLine = detail.split("\n").at(-1) ?? detail;
      return createDeviceBusyError("another process", lastLine);
    }
    return createDeviceError(
      "capture",
      `${binary} exited with ${code ?? signal ?? "unknown status"}${detail ? `: ${detail}` : ""}`
    );
  }

  private assertOpen(operation: string): void {
    if (!this.opened) {
      throw createDeviceError(operation, "device is not open");
    }
  }

  private requireProfile(operation: string): CaptureProfileT {
    this.assertOpen(operation);
    if (!this.profile) {
      throw createDeviceError(operation, "device is not configured");
    }
    return this.profile;
  }
}
