import type { ProgressSnapshot } from "../models/transfer.model";

const UNITS = ["B", "KB", "MB", "GB", "TB"];

/** 1536 → "1.5 KB". Powers of 1024, up to two decimals. */
export function humanBytes(size: number): string {
  if (!Number.isFinite(size) || size <= 0) {
    return "0 B";
  }
  const exponent = Math.min(Math.floor(Math.log(size) / Math.log(1024)), UNITS.length - 1);
  const value = Math.round((size / Math.pow(1024, exponent)) * 100) / 100;
  return `${value} ${UNITS[exponent]}`;
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

export function formatEta(seconds: number | null): string {
  if (seconds === null || !Number.isFinite(seconds) || seconds < 0) {
    return "--:--";
  }
  const total = Math.round(seconds);
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const secs = total % 60;
  return hours > 0 ? `${hours}:${pad(minutes)}:${pad(secs)}` : `${pad(minutes)}:${pad(secs)}`;
}

export function progressBar(percent: number | null, width: number = 30): string {
  if (percent === null) {
    return `[${".".repeat(width)}]`;
  }
  const clamped = Math.min(100, Math.max(0, percent));
  const filled = Math.round((clamped / 100) * width);
  return `[${"#".repeat(filled)}${".".repeat(width - filled)}]`;
}

export function renderProgress(snapshot: ProgressSnapshot, width: number = 30): string {
  const percent = snapshot.percent === null ? "?%" : `${snapshot.percent.toFixed(1)}%`;
  const total = snapshot.totalSize === null ? "" : ` / ${humanBytes(snapshot.totalSize)}`;
  return (
    `${progressBar(snapshot.percent, width)} ${percent} ` +
    `${humanBytes(snapshot.bytesTransferred)}${total} ` +
    `${humanBytes(snapshot.currentRateBytesPerSec)}/s ETA ${formatEta(snapshot.etaSeconds)}`
  );
}
