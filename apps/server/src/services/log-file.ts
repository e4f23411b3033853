import { mkdir } from "node:fs/promises";
import path from "node:path";

function formatDay(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${year}${month}${day}`;
}

/**
 * Daily log file name, e.g. camhub-20240131.log
 */
export function dailyLogFileName(date: Date = new Date()): string {
  return `camhub-${formatDay(date)}.log`;
}

/**
 * Create the log directory and return today's log file path
 */
export async function ensureDailyLogFile(
  logDir: string,
  date: Date = new Date()
): Promise<string> {
  await mkdir(logDir, { recursive: true });
  return path.join(logDir, dailyLogFileName(date));
}
