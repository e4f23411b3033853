const SOI = Buffer.from([0xff, 0xd8]);
const EOI = Buffer.from([0xff, 0xd9]);

/**
 * Buffered bytes are dropped past this size when no end marker shows up
 */
const MAX_PENDING_BYTES = 8 * 1024 * 1024;

/**
 * Splits a concatenated MJPEG byte stream into individual JPEG frames
 * by start-of-image / end-of-image markers.
 */
export class JpegFrameParser {
  private pending: Buffer = Buffer.alloc(0);

  /**
   * Feed a chunk and collect every frame it completes
   */
  push(chunk: Buffer): Buffer[] {
    this.pending =
      this.pending.length > 0 ? Buffer.concat([this.pending, chunk]) : chunk;

    const frames: Buffer[] = [];
    for (;;) {
      const start = this.pending.indexOf(SOI);
      if (start < 0) {
        // a trailing 0xFF may be the first half of the next marker
        this.pending = this.pending.subarray(
          Math.max(0, this.pending.length - 1)
        );
        break;
      }
      const end = this.pending.indexOf(EOI, start + SOI.length);
      if (end < 0) {
        this.pending = this.pending.subarray(start);
        break;
      }
      frames.push(Buffer.from(this.pending.subarray(start, end + EOI.length)));
      this.pending = this.pending.subarray(end + EOI.length);
    }

    if (this.pending.length > MAX_PENDING_BYTES) {
      this.pending = Buffer.alloc(0);
    }
    return frames;
  }

  reset(): void {
    this.pending = Buffer.alloc(0);
  }
}
