import fs from "fs";
import path from "path";
import type { ApplicationStatus } from "../storage/applicationStore";

export interface RunEvent {
  runId: string;
  fingerprint: string;
  step: string;
  status?: ApplicationStatus | "skipped";
  attempt?: number;
  title?: string;
  company?: string;
  url?: string;
  intent?: string;
  strategy?: "structural" | "image";
  error?: string;
  reason?: string;
  timestamp: string;
}

export interface RunLogger {
  logEvent(event: RunEvent): void;
  getLogPath(): string;
}

export function createRunLogger(logDir: string, runId: string): RunLogger {
  fs.mkdirSync(logDir, { recursive: true });
  const logPath = path.join(logDir, `run-${runId}.jsonl`);

  return {
    logEvent(event: RunEvent): void {
      const line = JSON.stringify(event);
      fs.appendFileSync(logPath, `${line}\n`, "utf8");
    },
    getLogPath(): string {
      return logPath;
    },
  };
}

export function createMemoryRunLogger(): RunLogger & { events: RunEvent[] } {
  const events: RunEvent[] = [];
  return {
    events,
    logEvent(event: RunEvent): void {
      events.push(event);
    },
    getLogPath(): string {
      return "";
    },
  };
}
