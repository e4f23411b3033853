/**
 * Shared wire types for the camhub HTTP and WebSocket API.
 */

/**
 * Externally visible capture mode.
 */
export type CaptureModeT = "idle" | "recording" | "converting" | "streaming";

/**
 * Recording status as reported by GET /status (streaming is reported apart).
 */
export type RecordingStateT = "idle" | "recording" | "converting";

export type CameraConfigT = {
  width: number;
  height: number;
  fps: number;
};

export type CameraConfigResponseT = CameraConfigT & {
  format: "mp4";
  resolution: string; // e.g. "1280x720"
};

export type SetConfigRequestT = Partial<CameraConfigT>;

export type SetConfigResponseT = {
  updated: true;
  config: CameraConfigResponseT;
};

export type StartRecordingResponseT = {
  accepted: true;
  resolution: string;
  fps: number;
};

export type StopRecordingResponseT = {
  accepted: true;
};

export type FinalizationStateT = "running" | "succeeded" | "failed";

/**
 * Post-recording transcode job summary
 */
export type FinalizationJobT = {
  inputPath: string;
  outputPath: string;
  startedAt: number;
  finishedAt: number | null;
  state: FinalizationStateT;
  failureDetail: string | null;
  outputBytes: number | null;
  stable: boolean | null;
};

export type StreamingStatusT = {
  active: boolean;
  subscribers: number;
  initializing: boolean;
};

export type CameraStatusT =
  | { state: "idle" }
  | {
      state: "recording";
      durationSeconds: number;
      startTime: number | null; // epoch ms when the device began writing
      requestedAt: number;
    }
  | { state: "converting"; since: number | null };

export type CameraStatusResponseT = CameraStatusT & {
  mode: CaptureModeT;
  streaming: StreamingStatusT;
  lastJob: FinalizationJobT | null;
};

export type StopStreamingResponseT = {
  stopped: true;
};

export type HealthResponseT = {
  running: true;
  version: string;
  uptime: number; // seconds since the process started
  host: string;
  port: number;
  device: string;
  mode: CaptureModeT;
  websocketClients: number;
};

/**
 * Error body shared by all endpoints
 */
export type ApiErrorResponseT = {
  success: false;
  error: string;
  message: string;
  details?: Record<string, unknown>;
};

export type WebSocketTopicT = "camera" | "streaming";

export type WebSocketClientMessageT =
  | { type: "subscribe"; topics: WebSocketTopicT[] }
  | { type: "unsubscribe"; topics: WebSocketTopicT[] };

export type WebSocketServerMessageT =
  | ({ type: "camera.status" } & CameraStatusResponseT)
  | ({ type: "streaming.status" } & StreamingStatusT);
