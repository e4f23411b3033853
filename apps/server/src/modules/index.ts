import type { LoggerLikeT } from "../services/logger.js";
import type { CaptureDeviceFactory } from "./capture-device.js";
import { MockCameraHardware } from "./mock/mock-capture-device.js";
import { RpicamDevice } from "./rpicam/rpicam-device.js";

const MOCK_FRAME_INTERVAL_MS = 33;

export const DEVICE_DRIVERS = ["rpicam", "mock"] as const;

export type DeviceDriverT = (typeof DEVICE_DRIVERS)[number];

/**
 * Create the capture device factory for the configured driver
 */
export function createDeviceFactory(
  driver: DeviceDriverT,
  logger: LoggerLikeT
): CaptureDeviceFactory {
  switch (driver) {
    case "rpicam":
      return () => new RpicamDevice(logger);
    case "mock": {
      logger.warn("[Modules] Using mock capture device");
      const hardware = new MockCameraHardware();
      hardware.frameIntervalMs = MOCK_FRAME_INTERVAL_MS;
      return hardware.createDevice;
    }
  }
}
