export type TranscodeResultT =
  | { ok: true; durationMs: number }
  | { ok: false; exitCode: number | null; detail: string; durationMs: number };

/**
 * External transcoder collaborator (raw H.264 -> MP4 container)
 */
export interface Transcoder {
  readonly name: string;
  transcode(inputPath: string, outputPath: string): Promise<TranscodeResultT>;
}
