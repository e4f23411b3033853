import { appendFile, writeFile } from "node:fs/promises";
import {
  setImmediate as nextTick,
  setTimeout as delay,
} from "node:timers/promises";
import {
  createDeviceBusyError,
  createDeviceError,
  createFrameCaptureError,
} from "../../camera/camera-errors.js";
import type { CaptureDevice, CaptureProfileT } from "../capture-device.js";

/**
 * Smallest byte sequence the frame parser and browsers accept as a JPEG
 */
export const MOCK_JPEG_FRAME = Buffer.from([
  0xff, 0xd8, 0xff, 0xe0, 0x00, 0x10, 0x4a, 0x46, 0x49, 0x46, 0x00, 0xff, 0xd9,
]);

/**
 * Annex B start code followed by an SPS NAL header
 */
export const MOCK_H264_HEADER = Buffer.from([0x00, 0x00, 0x00, 0x01, 0x67]);
export const MOCK_H264_TRAILER = Buffer.from([0x00, 0x00, 0x00, 0x01, 0x65]);

/**
 * Simulated camera shared by every MockCaptureDevice it creates
 *
 * Enforces the same exclusivity as the real sensor: a second open while
 * another handle is open fails with DEVICE_BUSY.
 */
export class MockCameraHardware {
  opens = 0;
  closes = 0;
  openHandles = 0;
  readonly devices: MockCaptureDevice[] = [];
  frame: Buffer = MOCK_JPEG_FRAME;
  writeRaw = true;
  frameIntervalMs = 0;
  failNextOpen: Error | null = null;
  failNextClose: Error | null = null;
  readonly frameErrors: Error[] = [];
  private openGate: Promise<void> | null = null;

  createDevice = (): CaptureDevice => {
    const device = new MockCaptureDevice(this);
    this.devices.push(device);
    return device;
  };

  /**
   * Hold every open() until the returned function is called
   */
  holdOpens(): () => void {
    let release: () => void = () => undefined;
    this.openGate = new Promise<void>((resolve) => {
      release = () => {
        this.openGate = null;
        resolve();
      };
    });
    return release;
  }

  waitForOpenGate(): Promise<void> {
    return this.openGate ?? Promise.resolve();
  }
}

/**
 * In-process capture device for development and tests
 */
export class MockCaptureDevice implements CaptureDevice {
  readonly name = "mock";
  profile: CaptureProfileT | null = null;
  recordingPath: string | null = null;
  private opened = false;
  private started = false;
  private readonly hardware: MockCameraHardware;

  constructor(hardware: MockCameraHardware) {
    this.hardware = hardware;
  }

  async open(): Promise<void> {
    if (this.opened) {
      throw createDeviceError("open", "device is already open");
    }
    await this.hardware.waitForOpenGate();
    const failure = this.hardware.failNextOpen;
    if (failure) {
      this.hardware.failNextOpen = null;
      throw failure;
    }
    if (this.hardware.openHandles > 0) {
      throw createDeviceBusyError(
        "another process",
        "Device or resource busy"
      );
    }
    this.opened = true;
    this.hardware.opens++;
    this.hardware.openHandles++;
  }

  async configure(profile: CaptureProfileT): Promise<void> {
    this.assertOpen("configure");
    this.profile = profile;
  }

  async start(): Promise<void> {
    this.assertOpen("start");
    if (!this.profile) {
      throw createDeviceError("start", "device is not configured");
    }
    this.started = true;
  }

  async startRecording(outputPath: string): Promise<void> {
    if (!this.started || this.profile?.kind !== "video") {
      throw createDeviceError("startRecording", "device is not in video mode");
    }
    this.recordingPath = outputPath;
    if (this.hardware.writeRaw) {
      await writeFile(outputPath, MOCK_H264_HEADER);
    }
  }

  async stopRecording(): Promise<void> {
    const outputPath = this.recordingPath;
    this.recordingPath = null;
    if (outputPath && this.hardware.writeRaw) {
      await appendFile(outputPath, MOCK_H264_TRAILER);
    }
  }

  async captureFrame(): Promise<Buffer> {
    if (this.hardware.frameIntervalMs > 0) {
      await delay(this.hardware.frameIntervalMs);
    } else {
      await nextTick();
    }
    if (!this.opened || !this.started || this.profile?.kind !== "mjpeg") {
      throw createFrameCaptureError("device is not streaming");
    }
    const failure = this.hardware.frameErrors.shift();
    if (failure) {
      throw failure;
    }
    return Buffer.from(this.hardware.frame);
  }

  async stop(): Promise<void> {
    this.started = false;
  }

  async close(): Promise<void> {
    if (!this.opened) {
      return;
    }
    const failure = this.hardware.failNextClose;
    if (failure) {
      this.hardware.failNextClose = null;
      throw failure;
    }
    this.opened = false;
    this.started = false;
    this.hardware.closes++;
    this.hardware.openHandles--;
  }

  isOpen(): boolean {
    return this.opened;
  }

  private assertOpen(operation: string): void {
    if (!this.opened) {
      throw createDeviceError(operation, "device is not open");
    }
  }
}
