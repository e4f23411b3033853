import type { StreamingStatusT } from "@camhub/protocol";
import type { CaptureDevice } from "../modules/capture-device.js";
import type { Clock } from "../services/clock.js";
import type { LoggerLikeT } from "../services/logger.js";
import {
  CameraErrorCode,
  createDeviceError,
  createFrameCaptureError,
  createUnavailableError,
  isCameraError,
} from "./camera-errors.js";
import type { DeviceRegistry, DeviceTokenT } from "./device-registry.js";
import { encodeMultipartFrame } from "./multipart.js";

export const DEFAULT_WARMUP_MS = 1000;
export const BUSY_RECOVERY_DELAY_MS = 1000;
export const FRAME_RETRY_DELAY_MS = 100;
const STILL_CAPTURE_ATTEMPTS = 3;

export type StreamProfileT = {
  width: number;
  height: number;
  fps: number;
  quality: number;
  rotation: 0 | 180;
};

export const DEFAULT_STREAM_PROFILE: StreamProfileT = {
  width: 640,
  height: 480,
  fps: 30,
  quality: 85,
  rotation: 180,
};

export type StreamMultiplexerOptionsT = {
  registry: DeviceRegistry;
  clock: Clock;
  logger: LoggerLikeT;
  profile?: StreamProfileT;
  warmupMs?: number;
  busyRecoveryDelayMs?: number;
  frameRetryDelayMs?: number;
  onStatusChange?: (status: StreamingStatusT) => void;
};

type StreamingSessionT = {
  token: DeviceTokenT;
  device: CaptureDevice;
  subscriberCount: number;
  deviceOpen: boolean;
  initInProgress: boolean;
  stopped: boolean;
};

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Streaming multiplexer
 *
 * Fans one open capture device out to any number of subscribers. The first
 * subscriber opens the device, later ones reuse it, and the last one to leave
 * closes it. Subscribers never open the device themselves.
 */
export class StreamMultiplexer {
  private session: StreamingSessionT | null = null;
  private closing: Promise<void> | null = null;
  private readonly registry: DeviceRegistry;
  private readonly clock: Clock;
  private readonly logger: LoggerLikeT;
  private readonly profile: StreamProfileT;
  private readonly warmupMs: number;
  private readonly busyRecoveryDelayMs: number;
  private readonly frameRetryDelayMs: number;
  private readonly onStatusChange?: (status: StreamingStatusT) => void;

  constructor(options: StreamMultiplexerOptionsT) {
    this.registry = options.registry;
    this.clock = options.clock;
    this.logger = options.logger;
    this.profile = options.profile ?? DEFAULT_STREAM_PROFILE;
    this.warmupMs = options.warmupMs ?? DEFAULT_WARMUP_MS;
    this.busyRecoveryDelayMs =
      options.busyRecoveryDelayMs ?? BUSY_RECOVERY_DELAY_MS;
    this.frameRetryDelayMs = options.frameRetryDelayMs ?? FRAME_RETRY_DELAY_MS;
    this.onStatusChange = options.onStatusChange;
  }

  snapshot(): StreamingStatusT {
    const session = this.session;
    return {
      active: session?.deviceOpen ?? false,
      subscribers: session?.subscriberCount ?? 0,
      initializing: session?.initInProgress ?? false,
    };
  }

  /**
   * Subscribe to the live stream
   *
   * Each call yields a fresh, infinite sequence of multipart-framed JPEG
   * chunks tied to the shared device. Nothing happens until the first value
   * is pulled. The sequence ends when `signal` aborts, when the consumer
   * calls return(), or when the stream is force-stopped.
   */
  async *subscribe(signal?: AbortSignal): AsyncGenerator<Buffer, void, undefined> {
    const session = await this.join();
    try {
      for await (const frame of this.frames(session, signal)) {
        yield encodeMultipartFrame(frame);
      }
    } finally {
      await this.leave(session);
    }
  }

  /**
   * Capture one JPEG from the shared device, opening it if nobody streams
   */
  async captureStill(): Promise<Buffer> {
    const session = await this.join();
    try {
      let lastError: unknown = null;
      for (let attempt = 1; attempt <= STILL_CAPTURE_ATTEMPTS; attempt++) {
        try {
          return await session.device.captureFrame();
        } catch (error) {
          if (isCameraError(error, CameraErrorCode.DEVICE_BUSY)) {
            await this.recoverFromBusy(session);
            throw error;
          }
          lastError = error;
          if (!this.isLive(session)) {
            break;
          }
          this.logger.warn(
            `[Stream] Still capture attempt ${attempt} failed: ${describe(error)}`
          );
          await this.clock.sleep(this.frameRetryDelayMs);
        }
      }
      throw createFrameCaptureError(lastError ?? "stream stopped");
    } finally {
      await this.leave(session);
    }
  }

  /**
   * Stop the shared stream for every subscriber and close the device
   *
   * @returns false when nothing was streaming
   */
  async forceStop(): Promise<boolean> {
    const session = this.session;
    if (!session) {
      if (this.closing) {
        await this.closing;
      }
      return false;
    }
    this.logger.warn(
      `[Stream] Force stop requested (${session.subscriberCount} subscriber(s))`
    );
    await this.detach(session);
    return true;
  }

  private async *frames(
    session: StreamingSessionT,
    signal?: AbortSignal
  ): AsyncGenerator<Buffer, void, undefined> {
    while (this.isLive(session) && !signal?.aborted) {
      let frame: Buffer;
      try {
        frame = await session.device.captureFrame();
      } catch (error) {
        if (isCameraError(error, CameraErrorCode.DEVICE_BUSY)) {
          await this.recoverFromBusy(session);
          throw error;
        }
        if (!this.isLive(session)) {
          this.logger.info("[Stream] Stream stopped, ending subscriber");
          return;
        }
        this.logger.warn(`[Stream] Frame capture error: ${describe(error)}`);
        await this.clock.sleep(this.frameRetryDelayMs);
        continue;
      }
      if (signal?.aborted) {
        return;
      }
      yield frame;
    }
  }

  private async join(): Promise<StreamingSessionT> {
    if (this.closing) {
      await this.closing;
    }

    const lease = this.registry.acquire("streaming");

    if (lease.shared) {
      const session = this.session;
      if (!session || session.token.id !== lease.token.id) {
        throw createUnavailableError("stream session is shutting down");
      }
      session.subscriberCount += 1;
      try {
        await lease.ready;
      } catch (error) {
        session.subscriberCount -= 1;
        throw error;
      }
      if (!this.isLive(session)) {
        session.subscriberCount -= 1;
        throw createUnavailableError("stream stopped during initialization");
      }
      this.logger.info(
        `[Stream] Subscriber joined (${session.subscriberCount} active)`
      );
      this.publish();
      return session;
    }

    const session: StreamingSessionT = {
      token: lease.token,
      device: this.registry.deviceFor(lease.token),
      subscriberCount: 1,
      deviceOpen: false,
      initInProgress: true,
      stopped: false,
    };
    this.session = session;
    this.publish();

    try {
      this.logger.info(
        `[Stream] Opening camera for streaming (${this.profile.width}x${this.profile.height}@${this.profile.fps}fps)`
      );
      await session.device.open();
      await session.device.configure({ kind: "mjpeg", ...this.profile });
      await session.device.start();
      // first frames after start are photometrically unstable
      await this.clock.sleep(this.warmupMs);
    } catch (error) {
      this.logger.error(`[Stream] Failed to start camera: ${describe(error)}`);
      session.subscriberCount -= 1;
      session.initInProgress = false;
      await this.detach(session);
      if (isCameraError(error, CameraErrorCode.DEVICE_BUSY)) {
        await this.recoverFromBusy(session);
      }
      throw isCameraError(error) ? error : createDeviceError("stream start", error);
    }

    if (session.stopped) {
      session.subscriberCount -= 1;
      throw createUnavailableError("stream stopped during initialization");
    }

    session.deviceOpen = true;
    session.initInProgress = false;
    this.registry.markReady(session.token);
    this.logger.info("[Stream] Camera ready, streaming started");
    this.publish();
    return session;
  }

  private async leave(session: StreamingSessionT): Promise<void> {
    session.subscriberCount = Math.max(0, session.subscriberCount - 1);
    this.logger.info(
      `[Stream] Subscriber left (${session.subscriberCount} remaining)`
    );
    if (session.subscriberCount === 0 && this.session === session) {
      await this.detach(session);
      return;
    }
    this.publish();
  }

  /**
   * Unhook a session, close its device and release the token. Joiners that
   * arrive meanwhile wait for the close to finish before acquiring.
   */
  private async detach(session: StreamingSessionT): Promise<void> {
    session.stopped = true;
    if (this.session === session) {
      this.session = null;
    }
    const closing = this.shutdown(session).finally(() => {
      if (this.closing === closing) {
        this.closing = null;
      }
    });
    this.closing = closing;
    await closing;
    this.publish();
  }

  private async shutdown(session: StreamingSessionT): Promise<void> {
    session.deviceOpen = false;
    const { device } = session;
    try {
      if (device.isOpen()) {
        await device.stop();
        await device.close();
      }
    } catch (error) {
      this.logger.error(`[Stream] Error closing camera: ${describe(error)}`);
      try {
        await device.close();
      } catch (closeError) {
        this.logger.error(
          `[Stream] Camera close retry failed: ${describe(closeError)}`
        );
      }
    }
    this.registry.release(session.token);
    this.logger.info("[Stream] Camera closed");
  }

  /**
   * Another process holds the camera: drop our handles, give the OS time to
   * release the device, and let the caller surface the error.
   */
  private async recoverFromBusy(session: StreamingSessionT): Promise<void> {
    this.logger.warn("[Stream] Camera busy, force-closing device handles");
    if (!session.stopped) {
      await this.detach(session);
    }
    await this.registry.closeLingeringHandles();
    await this.clock.sleep(this.busyRecoveryDelayMs);
  }

  private isLive(session: StreamingSessionT): boolean {
    return !session.stopped && session.device.isOpen();
  }

  private publish(): void {
    this.onStatusChange?.(this.snapshot());
  }
}
