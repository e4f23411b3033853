import { parseConfig } from "./config.js";
import { createServer, startServer } from "./server.js";
import { logFfmpegStatus } from "./services/ffmpeg-self-test.js";

/**
 * Camera server entry point
 * Parses CLI arguments, validates configuration, and starts the server
 */
async function main() {
  // Parse CLI arguments (skip first two: node executable and script path)
  const args = process.argv.slice(2);
  const config = parseConfig(args);

  const server = await createServer(config);
  await logFfmpegStatus(server.log);
  await startServer(server, config);
}

main().catch((error: unknown) => {
  console.error("Failed to start camera server:", error);
  process.exit(1);
});
