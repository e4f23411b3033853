import { EventEmitter } from "node:events";
import type { CaptureModeT } from "@camhub/protocol";
import type {
  CaptureDevice,
  CaptureDeviceFactory,
} from "../modules/capture-device.js";
import type { LoggerLikeT } from "../services/logger.js";
import {
  createDeviceBusyError,
  createDeviceError,
  createUnavailableError,
} from "./camera-errors.js";

const DEFAULT_STREAMING_INIT_TIMEOUT_MS = 5000;

export type DeviceOwnerModeT = Exclude<CaptureModeT, "idle">;

/**
 * Proof of ownership over the capture device (or, for converting, over the
 * camera's output files while the device itself stays closed)
 */
export type DeviceTokenT = {
  readonly id: number;
  readonly mode: DeviceOwnerModeT;
  readonly acquiredAt: number;
};

/**
 * Result of acquire()
 *
 * `shared` leases reuse a streaming token another subscriber owns; their
 * `ready` settles once that owner finished opening the device.
 */
export type DeviceLeaseT = {
  token: DeviceTokenT;
  shared: boolean;
  ready: Promise<void>;
};

export type DeviceRegistryOptionsT = {
  createDevice: CaptureDeviceFactory;
  logger: LoggerLikeT;
  streamingInitTimeoutMs?: number;
  now?: () => number;
};

/**
 * Device handle registry
 *
 * Single point of mutual exclusion for the camera. Every check-and-set runs
 * synchronously, so two callers on the event loop can never both observe
 * "idle" and both win the device.
 */
export class DeviceRegistry {
  private token: DeviceTokenT | null = null;
  private device: CaptureDevice | null = null;
  private initInProgress = false;
  private nextTokenId = 1;
  private readonly lingering = new Set<CaptureDevice>();
  private readonly events = new EventEmitter();
  private readonly createDevice: CaptureDeviceFactory;
  private readonly logger: LoggerLikeT;
  private readonly streamingInitTimeoutMs: number;
  private readonly now: () => number;

  constructor(options: DeviceRegistryOptionsT) {
    this.createDevice = options.createDevice;
    this.logger = options.logger;
    this.streamingInitTimeoutMs =
      options.streamingInitTimeoutMs ?? DEFAULT_STREAMING_INIT_TIMEOUT_MS;
    this.now = options.now ?? Date.now;
    // one listener pair per waiting subscriber
    this.events.setMaxListeners(0);
  }

  currentMode(): CaptureModeT {
    return this.token?.mode ?? "idle";
  }

  isInitInProgress(): boolean {
    return this.initInProgress;
  }

  /**
   * Acquire the device for recording or streaming
   *
   * Recording fails fast with DEVICE_BUSY unless idle. Streaming joins an
   * existing streaming token as a shared lease; if that token is still being
   * initialized, the lease's `ready` waits up to the init timeout and rejects
   * with UNAVAILABLE if the device never became ready.
   */
  acquire(mode: "recording" | "streaming"): DeviceLeaseT {
    const held = this.token;

    if (!held) {
      const token = this.issue(mode);
      this.device = this.createDevice();
      this.initInProgress = mode === "streaming";
      this.logger.info(`[Registry] Device acquired for ${mode} (token ${token.id})`);
      this.publishMode();
      return { token, shared: false, ready: Promise.resolve() };
    }

    if (mode === "streaming" && held.mode === "streaming") {
      return {
        token: held,
        shared: true,
        ready: this.initInProgress
          ? this.waitForReady(held)
          : Promise.resolve(),
      };
    }

    this.logger.warn(
      `[Registry] Rejected ${mode} acquire: device held by ${held.mode}`
    );
    throw createDeviceBusyError(held.mode);
  }

  /**
   * Borrow the device behind a valid token
   */
  deviceFor(token: DeviceTokenT): CaptureDevice {
    this.assertCurrent(token);
    if (!this.device) {
      throw createDeviceError(
        "lookup",
        `no device attached to ${token.mode} token`
      );
    }
    return this.device;
  }

  /**
   * Signal that the streaming owner finished opening the device
   */
  markReady(token: DeviceTokenT): void {
    this.assertCurrent(token);
    this.initInProgress = false;
    this.events.emit("ready", token.id);
  }

  /**
   * Move a recording token to converting without passing through idle
   */
  handOff(token: DeviceTokenT, mode: "converting"): DeviceTokenT {
    this.assertCurrent(token);
    this.retireDevice();
    const next = this.issue(mode);
    this.logger.info(
      `[Registry] Token ${token.id} handed off from ${token.mode} to ${mode} (token ${next.id})`
    );
    this.publishMode();
    return next;
  }

  /**
   * Release a token. Stale tokens are ignored so a late release can never
   * free a device another owner holds.
   */
  release(token: DeviceTokenT): boolean {
    if (this.token?.id !== token.id) {
      this.logger.warn(
        `[Registry] Ignoring release of stale token ${token.id} (${token.mode})`
      );
      return false;
    }
    this.retireDevice();
    this.token = null;
    this.initInProgress = false;
    this.logger.info(`[Registry] Token ${token.id} released (${token.mode})`);
    this.events.emit("released", token.id);
    this.publishMode();
    return true;
  }

  /**
   * Close device handles whose owners released them while still open
   *
   * @returns Number of handles closed
   */
  async closeLingeringHandles(): Promise<number> {
    let closed = 0;
    for (const device of [...this.lingering]) {
      try {
        await device.close();
        this.lingering.delete(device);
        closed++;
      } catch (error) {
        this.logger.error(
          `[Registry] Failed to close lingering ${device.name} handle: ${
            error instanceof Error ? error.message : String(error)
          }`
        );
      }
    }
    if (closed > 0) {
      this.logger.warn(`[Registry] Closed ${closed} lingering device handle(s)`);
    }
    return closed;
  }

  lingeringHandleCount(): number {
    return this.lingering.size;
  }

  /**
   * Listen for capture mode changes
   *
   * @returns Unsubscribe function
   */
  onModeChange(listener: (mode: CaptureModeT) => void): () => void {
    this.events.on("mode", listener);
    return () => {
      this.events.off("mode", listener);
    };
  }

  private issue(mode: DeviceOwnerModeT): DeviceTokenT {
    const token: DeviceTokenT = {
      id: this.nextTokenId++,
      mode,
      acquiredAt: this.now(),
    };
    this.token = token;
    return token;
  }

  private retireDevice(): void {
    const device = this.device;
    this.device = null;
    if (device && device.isOpen()) {
      this.logger.warn(
        `[Registry] ${device.name} handle released while still open`
      );
      this.lingering.add(device);
    }
  }

  private waitForReady(token: DeviceTokenT): Promise<void> {
    const timeoutMs = this.streamingInitTimeoutMs;
    return new Promise<void>((resolve, reject) => {
      const cleanup = () => {
        clearTimeout(timer);
        this.events.off("ready", onReady);
        this.events.off("released", onReleased);
      };
      const onReady = (tokenId: number) => {
        if (tokenId !== token.id) return;
        cleanup();
        resolve();
      };
      const onReleased = (tokenId: number) => {
        if (tokenId !== token.id) return;
        cleanup();
        reject(createUnavailableError("stream initialization failed"));
      };
      const timer = setTimeout(() => {
        cleanup();
        reject(
          createUnavailableError(
            `device did not become ready within ${timeoutMs}ms`
          )
        );
      }, timeoutMs);
      this.events.on("ready", onReady);
      this.events.on("released", onReleased);
    });
  }

  private assertCurrent(token: DeviceTokenT): void {
    if (this.token?.id !== token.id) {
      throw createUnavailableError(
        `device token ${token.id} (${token.mode}) is no longer valid`
      );
    }
  }

  private publishMode(): void {
    this.events.emit("mode", this.currentMode());
  }
}
