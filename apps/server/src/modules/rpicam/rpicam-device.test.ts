import { readFile } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { CameraErrorCode } from "../../camera/camera-errors.js";
import { DeviceRegistry } from "../../camera/device-registry.js";
import { encodeMultipartFrame } from "../../camera/multipart.js";
import { StreamMultiplexer } from "../../camera/stream-multiplexer.js";
import { FakeClock } from "../../test-utils/fake-clock.js";
import { writeFakeExecutable } from "../../test-utils/fake-executable.js";
import { createTempDir, silentLogger } from "../../test-utils/test-env.js";
import type { CaptureProfileT } from "../capture-device.js";
import { RpicamDevice, type RpicamTimingsT } from "./rpicam-device.js";

const TIMINGS: RpicamTimingsT = {
  startupGraceMs: 300,
  stopSigtermAfterMs: 150,
  stopSigkillAfterMs: 300,
  frameTimeoutMs: 2000,
};

const MJPEG: CaptureProfileT = {
  kind: "mjpeg",
  width: 640,
  height: 480,
  fps: 30,
  rotation: 180,
  quality: 85,
};

const VIDEO: CaptureProfileT = {
  kind: "video",
  width: 1280,
  height: 720,
  fps: 30,
  rotation: 180,
};

const FRAME = Buffer.from([0xff, 0xd8, 0x01, 0x02, 0xff, 0xd9]);

const STREAMING_SCRIPT = `
const frame = Buffer.from([0xff, 0xd8, 0x01, 0x02, 0xff, 0xd9]);
process.on("SIGINT", () => process.exit(0));
setInterval(() => process.stdout.write(frame), 20);
`;

describe("RpicamDevice", () => {
  let dir: string;
  let cleanup: () => Promise<void>;
  let savedPath: string | undefined;
  let device: RpicamDevice;

  beforeEach(async () => {
    ({ dir, cleanup } = await createTempDir());
    savedPath = process.env.PATH;
    delete process.env.RPICAM_PATH;
    device = new RpicamDevice(silentLogger, TIMINGS);
  });

  afterEach(async () => {
    await device.close();
    if (savedPath === undefined) {
      delete process.env.PATH;
    } else {
      process.env.PATH = savedPath;
    }
    delete process.env.RPICAM_PATH;
    await cleanup();
  });

  async function useBinary(source: string): Promise<string> {
    const binary = await writeFakeExecutable(dir, "rpicam-vid", source);
    process.env.RPICAM_PATH = binary;
    return binary;
  }

  async function startStreaming(): Promise<void> {
    await device.open();
    await device.configure(MJPEG);
    await device.start();
  }

  it("reads JPEG frames from the capture process", async () => {
    await useBinary(STREAMING_SCRIPT);

    await startStreaming();

    await expect(device.captureFrame()).resolves.toEqual(FRAME);
    expect(device.isOpen()).toBe(true);
  });

  it("writes the recording and lets the encoder flush on stop", async () => {
    await useBinary(`
const fs = require("node:fs");
const out = process.argv[process.argv.indexOf("-o") + 1];
fs.writeFileSync(out, "header;");
process.on("SIGINT", () => {
  fs.appendFileSync(out, "trailer");
  process.exit(0);
});
setInterval(() => {}, 1000);
`);
    const rawPath = path.join(dir, "camera_video.h264");

    await device.open();
    await device.configure(VIDEO);
    await device.start();
    await device.startRecording(rawPath);
    await device.stopRecording();

    expect(await readFile(rawPath, "utf-8")).toBe("header;trailer");
  });

  it("falls back to libcamera-vid when rpicam-vid is not installed", async () => {
    await writeFakeExecutable(dir, "libcamera-vid", STREAMING_SCRIPT);
    process.env.PATH = dir;

    await startStreaming();

    await expect(device.captureFrame()).resolves.toEqual(FRAME);
  });

  it("fails with DEVICE_ERROR when no capture binary exists", async () => {
    process.env.PATH = dir;

    await expect(startStreaming()).rejects.toMatchObject({
      code: CameraErrorCode.DEVICE_ERROR,
      message:
        "Camera start failed: no capture binary found (tried rpicam-vid, libcamera-vid)",
    });
  });

  it("maps a busy camera reported on stderr to DEVICE_BUSY", async () => {
    await useBinary(`
process.stderr.write("Preview window unavailable\\nERROR: Device or resource busy\\n");
process.exit(1);
`);

    await expect(startStreaming()).rejects.toMatchObject({
      code: CameraErrorCode.DEVICE_BUSY,
      message: "Camera is busy: ERROR: Device or resource busy",
    });
  });

  it("reports other early exits as DEVICE_ERROR with the stderr tail", async () => {
    const binary = await useBinary(`
process.stderr.write("sensor fault\\n");
process.exit(2);
`);

    await expect(startStreaming()).rejects.toMatchObject({
      code: CameraErrorCode.DEVICE_ERROR,
      message: `Camera capture failed: ${binary} exited with 2: sensor fault`,
    });
  });

  it("stops counting as open when the capture process dies", async () => {
    const binary = await useBinary(`
setTimeout(() => {
  process.stderr.write("pipeline stalled\\n");
  process.exit(1);
}, 500);
`);
    await startStreaming();

    await expect(device.captureFrame()).rejects.toMatchObject({
      code: CameraErrorCode.DEVICE_ERROR,
      message: `Camera capture failed: ${binary} exited with 1: pipeline stalled`,
    });
    expect(device.isOpen()).toBe(false);
    await expect(device.captureFrame()).rejects.toMatchObject({
      code: CameraErrorCode.FRAME_CAPTURE_ERROR,
    });
  });

  it("escalates to SIGTERM and SIGKILL when SIGINT is ignored", async () => {
    const signalLog = path.join(dir, "signals.log");
    await useBinary(`
const fs = require("node:fs");
const log = ${JSON.stringify(signalLog)};
process.on("SIGINT", () => fs.appendFileSync(log, "SIGINT\\n"));
process.on("SIGTERM", () => fs.appendFileSync(log, "SIGTERM\\n"));
setInterval(() => {}, 1000);
`);
    await startStreaming();

    await device.stop();

    expect(await readFile(signalLog, "utf-8")).toBe("SIGINT\nSIGTERM\n");
  });

  it("ends a live stream and frees the registry when the capture process dies", async () => {
    await useBinary(`
const frame = Buffer.from([0xff, 0xd8, 0x01, 0x02, 0xff, 0xd9]);
setInterval(() => process.stdout.write(frame), 20);
setTimeout(() => process.exit(1), 600);
`);
    const registry = new DeviceRegistry({
      createDevice: () => new RpicamDevice(silentLogger, TIMINGS),
      logger: silentLogger,
    });
    const multiplexer = new StreamMultiplexer({
      registry,
      clock: new FakeClock(),
      logger: silentLogger,
    });

    const parts: Buffer[] = [];
    for await (const part of multiplexer.subscribe()) {
      parts.push(part);
    }

    expect(parts.length).toBeGreaterThan(0);
    expect(parts[0]).toEqual(encodeMultipartFrame(FRAME));
    expect(registry.currentMode()).toBe("idle");
    expect(multiplexer.snapshot()).toEqual({
      active: false,
      subscribers: 0,
      initializing: false,
    });
  });
});
