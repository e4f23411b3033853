/**
 * Capture profile applied by configure()
 *
 * "video" feeds the H.264 encoder for recording, "mjpeg" produces JPEG frames
 * for live streaming and still probes.
 */
export type CaptureProfileT =
  | {
      kind: "video";
      width: number;
      height: number;
      fps: number;
      rotation: 0 | 180;
    }
  | {
      kind: "mjpeg";
      width: number;
      height: number;
      fps: number;
      rotation: 0 | 180;
      quality: number;
    };

/**
 * Capture device controller interface for runtime operations
 *
 * A controller is created per ownership token and borrowed by exactly one
 * owner at a time. Lifecycle: open -> configure -> start -> (startRecording /
 * captureFrame) -> stop -> close.
 */
export interface CaptureDevice {
  /**
   * Driver name, used in logs
   */
  readonly name: string;

  /**
   * Open device exclusively
   */
  open(): Promise<void>;

  configure(profile: CaptureProfileT): Promise<void>;

  /**
   * Start the sensor pipeline with the configured profile
   */
  start(): Promise<void>;

  /**
   * Direct the encoder output into a raw file (video profile only)
   */
  startRecording(outputPath: string): Promise<void>;

  /**
   * Stop the encoder and flush the raw file
   */
  stopRecording(): Promise<void>;

  /**
   * Resolve with the next complete JPEG frame (mjpeg profile only)
   */
  captureFrame(): Promise<Buffer>;

  stop(): Promise<void>;

  /**
   * Close device and release exclusive access
   */
  close(): Promise<void>;

  isOpen(): boolean;
}

export type CaptureDeviceFactory = () => CaptureDevice;

/**
 * Recognise the driver messages that mean another process owns the camera
 */
export function isDeviceBusyMessage(text: string): boolean {
  const lowered = text.toLowerCase();
  return (
    lowered.includes("device or resource busy") ||
    lowered.includes("in use by another process") ||
    lowered.includes("failed to acquire camera")
  );
}
