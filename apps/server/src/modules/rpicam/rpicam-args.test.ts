import { afterEach, describe, expect, it } from "vitest";
import {
  buildMjpegArgs,
  buildRecordingArgs,
  resolveRpicamCandidates,
} from "./rpicam-args.js";

describe("rpicam arguments", () => {
  afterEach(() => {
    delete process.env.RPICAM_PATH;
  });

  it("records raw H.264 into the given file", () => {
    expect(
      buildRecordingArgs(
        { kind: "video", width: 1920, height: 1080, fps: 25, rotation: 180 },
        "video/camera_video.h264"
      )
    ).toEqual([
      "-t",
      "0",
      "--width",
      "1920",
      "--height",
      "1080",
      "--framerate",
      "25",
      "--rotation",
      "180",
      "-n",
      "--codec",
      "h264",
      "--inline",
      "-o",
      "video/camera_video.h264",
    ]);
  });

  it("streams MJPEG to stdout with the requested quality", () => {
    expect(
      buildMjpegArgs({
        kind: "mjpeg",
        width: 640,
        height: 480,
        fps: 30,
        rotation: 0,
        quality: 70,
      })
    ).toEqual([
      "-t",
      "0",
      "--width",
      "640",
      "--height",
      "480",
      "--framerate",
      "30",
      "--rotation",
      "0",
      "-n",
      "--codec",
      "mjpeg",
      "--quality",
      "70",
      "-o",
      "-",
    ]);
  });

  it("prefers rpicam-vid and falls back to libcamera-vid", () => {
    expect(resolveRpicamCandidates()).toEqual(["rpicam-vid", "libcamera-vid"]);
  });

  it("uses only the configured binary when RPICAM_PATH is set", () => {
    process.env.RPICAM_PATH = "/opt/camera/bin/rpicam-vid";

    expect(resolveRpicamCandidates()).toEqual(["/opt/camera/bin/rpicam-vid"]);
  });
});
