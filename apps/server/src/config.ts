import { z } from "zod";
import { DEVICE_DRIVERS } from "./modules/index.js";

/**
 * Server configuration schema
 */
const ConfigSchema = z.object({
  host: z.string().ip({ version: "v4", message: "Invalid IPv4 address" }),
  port: z.number().int().min(1).max(65535),
  videoDir: z.string().min(1),
  logDir: z.string().min(1),
  device: z.enum(DEVICE_DRIVERS),
});

export type ServerConfigT = z.infer<typeof ConfigSchema>;

type EnvT = Record<string, string | undefined>;

/**
 * Parse CLI arguments and return validated configuration
 *
 * CLI flags win over CAMHUB_* environment variables, which win over defaults.
 */
export function parseConfig(
  args: string[],
  env: EnvT = process.env
): ServerConfigT {
  const config: {
    host: string;
    port: number;
    videoDir: string;
    logDir: string;
    device: string;
  } = {
    host: env.CAMHUB_HOST ?? "0.0.0.0",
    port: env.CAMHUB_PORT ? parseInt(env.CAMHUB_PORT, 10) : 5000,
    videoDir: env.CAMHUB_VIDEO_DIR ?? "video",
    logDir: env.CAMHUB_LOG_DIR ?? "log",
    device: env.CAMHUB_DEVICE ?? "rpicam",
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const nextArg = args[i + 1];

    if (arg === "--host" && nextArg) {
      config.host = nextArg;
      i++; // Skip next argument as it's the value
    } else if (arg === "--port" && nextArg) {
      config.port = parseInt(nextArg, 10);
      i++;
    } else if (arg === "--video-dir" && nextArg) {
      config.videoDir = nextArg;
      i++;
    } else if (arg === "--log-dir" && nextArg) {
      config.logDir = nextArg;
      i++;
    } else if (arg === "--device" && nextArg) {
      config.device = nextArg;
      i++;
    }
  }

  // Validate with Zod
  return ConfigSchema.parse(config);
}
