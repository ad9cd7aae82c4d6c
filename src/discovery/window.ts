import { ConfigError } from "../core/errors";
import type { TimeWindow } from "../types/jobs";

const UNIT_HOURS: Record<string, number> = {
  m: 1 / 60,
  h: 1,
  d: 24,
  w: 24 * 7,
};

export function parseWindow(value: string): TimeWindow {
  const match = /^\s*(\d+(?:\.\d+)?)\s*([mhdw])\s*$/i.exec(value);
  if (!match) {
    throw new ConfigError(`Invalid time window "${value}" (expected e.g. 24h, 3d, 1w)`);
  }
  const amount = Number(match[1]);
  const unit = match[2].toLowerCase();
  const hours = amount * UNIT_HOURS[unit];
  if (!(hours > 0)) {
    throw new ConfigError(`Time window must be positive: "${value}"`);
  }
  return { label: `${match[1]}${unit}`, hours };
}

export function windowStart(window: TimeWindow, now: Date): Date {
  return new Date(now.getTime() - window.hours * 3_600_000);
}

export function isWithinWindow(postedAt: string, window: TimeWindow, now: Date): boolean {
  const posted = Date.parse(postedAt);
  return Number.isFinite(posted) && posted >= windowStart(window, now).getTime();
}

export function sortWindows(windows: TimeWindow[]): TimeWindow[] {
  return windows.slice().sort((a, b) => a.hours - b.hours);
}
