import { appendFileSync, existsSync, mkdirSync } from "fs";
import { dirname, resolve } from "path";
import { config } from "./config";

type Level = "INFO" | "WARN" | "ERROR";

const logFile: string | null = config.logFile ? resolve(process.cwd(), config.logFile) : null;

function formatDetail(detail: unknown): string {
  if (detail === undefined) return "";
  if (detail instanceof Error) return `: ${detail.message}`;
  return `: ${String(detail)}`;
}

function writeLine(level: Level, line: string): void {
  if (!logFile) return;
  const dir = dirname(logFile);
  if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
  appendFileSync(logFile, `${new Date().toISOString()} - ${level} - ${line}\n`, "utf-8");
}

export interface Logger {
  info(message: string): void;
  warn(message: string, detail?: unknown): void;
  error(message: string, detail?: unknown): void;
}

export function createLogger(tag: string): Logger {
  return {
    info(message) {
      const line = `[${tag}] ${message}`;
      console.log(line);
      writeLine("INFO", line);
    },
    warn(message, detail) {
      const line = `[${tag}] ${message}${formatDetail(detail)}`;
      console.warn(line);
      writeLine("WARN", line);
    },
    error(message, detail) {
      const line = `[${tag}] ${message}${formatDetail(detail)}`;
      console.error(line);
      writeLine("ERROR", line);
    },
  };
}
