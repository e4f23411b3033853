export const MULTIPART_BOUNDARY = "frame";

export const MULTIPART_CONTENT_TYPE = `multipart/x-mixed-replace; boundary=${MULTIPART_BOUNDARY}`;

/**
 * Wrap one JPEG frame as a part of a multipart/x-mixed-replace body
 */
export function encodeMultipartFrame(
  jpeg: Buffer,
  boundary: string = MULTIPART_BOUNDARY
): Buffer {
  const header = Buffer.from(
    `--${boundary}\r\n` +
      `Content-Type: image/jpeg\r\n` +
      `Content-Length: ${jpeg.length}\r\n\r\n`,
    "ascii"
  );
  return Buffer.concat([header, jpeg, Buffer.from("\r\n", "ascii")]);
}
