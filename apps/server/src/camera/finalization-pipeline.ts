import type { FinalizationJobT } from "@camhub/protocol";
import type { Clock } from "../services/clock.js";
import type { LoggerLikeT } from "../services/logger.js";
import { createTranscodeFailedError } from "./camera-errors.js";
import type { DeviceRegistry, DeviceTokenT } from "./device-registry.js";
import {
  readFileSize,
  waitForFileStability,
  type FileSizeReader,
} from "./file-stability.js";
import type { Transcoder } from "./transcoder.js";

export type FinalizationPipelineOptionsT = {
  registry: DeviceRegistry;
  transcoder: Transcoder;
  clock: Clock;
  logger: LoggerLikeT;
  readSize?: FileSizeReader;
  stabilityIntervalMs?: number;
  stabilityMaxChecks?: number;
  onJobChange?: (job: FinalizationJobT) => void;
};

function formatBytes(size: number): string {
  return `${size.toLocaleString("en-US")} bytes (${(size / 1024 / 1024).toFixed(2)} MB)`;
}

/**
 * Finalization pipeline
 *
 * Runs once a recording released the device: transcode the raw capture, then
 * wait until the output file stops growing. Exactly one job runs at a time,
 * which the registry's converting token guarantees. A failed transcode is
 * terminal for that recording: the raw file is kept and nothing is retried.
 */
export class FinalizationPipeline {
  private current: FinalizationJobT | null = null;
  private last: FinalizationJobT | null = null;
  private readonly options: FinalizationPipelineOptionsT;
  private readonly readSize: FileSizeReader;

  constructor(options: FinalizationPipelineOptionsT) {
    this.options = options;
    this.readSize = options.readSize ?? readFileSize;
  }

  isRunning(): boolean {
    return this.current !== null;
  }

  currentJob(): FinalizationJobT | null {
    return this.current;
  }

  /**
   * Most recent finished job
   */
  lastJob(): FinalizationJobT | null {
    return this.last;
  }

  /**
   * Finalize a recording. Takes over the recording token and always releases
   * the device registry back to idle before resolving.
   */
  async run(
    recordingToken: DeviceTokenT,
    inputPath: string,
    outputPath: string
  ): Promise<FinalizationJobT> {
    const { registry, clock, logger } = this.options;

    let inputSize: number | null;
    try {
      inputSize = await this.readSize(inputPath);
    } catch (error) {
      registry.release(recordingToken);
      throw error;
    }

    if (inputSize === null) {
      logger.error(`[Finalize] Raw file not found: ${inputPath}`);
      const job: FinalizationJobT = {
        inputPath,
        outputPath,
        startedAt: clock.now(),
        finishedAt: clock.now(),
        state: "failed",
        failureDetail: "Raw output missing",
        outputBytes: null,
        stable: null,
      };
      this.finish(job);
      registry.release(recordingToken);
      return job;
    }

    logger.info(`[Finalize] Raw file size: ${formatBytes(inputSize)}`);
    const token = registry.handOff(recordingToken, "converting");

    let job: FinalizationJobT = {
      inputPath,
      outputPath,
      startedAt: clock.now(),
      finishedAt: null,
      state: "running",
      failureDetail: null,
      outputBytes: null,
      stable: null,
    };
    this.current = job;
    this.options.onJobChange?.(job);

    try {
      job = await this.transcodeAndStabilize(job);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`[Finalize] Unexpected failure: ${message}`);
      job = { ...job, state: "failed", failureDetail: message };
    } finally {
      job = { ...job, finishedAt: clock.now() };
      this.finish(job);
      registry.release(token);
    }

    return job;
  }

  private async transcodeAndStabilize(
    job: FinalizationJobT
  ): Promise<FinalizationJobT> {
    const { transcoder, clock, logger } = this.options;

    logger.info(
      `[Finalize] Starting conversion with ${transcoder.name} (${job.inputPath} -> ${job.outputPath})`
    );
    const result = await transcoder.transcode(job.inputPath, job.outputPath);

    if (!result.ok) {
      const error = createTranscodeFailedError(result.exitCode, result.detail);
      logger.error(`[Finalize] ${error.message}`);
      logger.error(`[Finalize] Transcoder output: ${result.detail}`);
      logger.warn(`[Finalize] Raw file preserved at ${job.inputPath}`);
      return {
        ...job,
        state: "failed",
        failureDetail: `${error.message}: ${result.detail}`,
      };
    }

    logger.info(
      `[Finalize] Conversion completed in ${(result.durationMs / 1000).toFixed(2)} seconds`
    );

    if ((await this.readSize(job.outputPath)) === null) {
      logger.error(`[Finalize] Output not found after conversion: ${job.outputPath}`);
      return {
        ...job,
        state: "failed",
        failureDetail: "Output missing after conversion",
      };
    }

    logger.info("[Finalize] Waiting for output file to stabilize...");
    const stability = await waitForFileStability(job.outputPath, {
      clock,
      readSize: this.readSize,
      intervalMs: this.options.stabilityIntervalMs,
      maxChecks: this.options.stabilityMaxChecks,
    });

    if (stability.stable) {
      logger.info(
        `[Finalize] Output size stabilized after ${stability.checks} checks: ${formatBytes(stability.size ?? 0)}`
      );
    } else {
      logger.warn(
        `[Finalize] Output did not stabilize after ${stability.checks} checks, proceeding anyway`
      );
    }

    logger.info("[Finalize] File is ready for download");
    return {
      ...job,
      state: "succeeded",
      outputBytes: stability.size,
      stable: stability.stable,
    };
  }

  private finish(job: FinalizationJobT): void {
    this.current = null;
    this.last = job;
    this.options.onJobChange?.(job);
  }
}
