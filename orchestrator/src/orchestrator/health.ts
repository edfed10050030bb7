import type { Platform } from "@mention-pulse/collector";
import type { PlatformStatus } from "./types.js";

export interface PlatformHealth {
  status: PlatformStatus;
  enabled: boolean;
  lastAttemptAt?: number;
  lastSuccessAt?: number;
  lastError?: string;
  /** Epoch ms before which the platform is not polled again. */
  retryAt?: number;
  itemsLastRun: number;
}

export interface HealthSnapshot {
  startTime: number;
  cyclesCompleted: number;
  lastCycleAt?: number;
  cycleRunning: boolean;
  platforms: Map<Platform, PlatformHealth>;
}

export function createHealthSnapshot(platforms: readonly Platform[], now = Date.now()): HealthSnapshot {
  return {
    startTime: now,
    cyclesCompleted: 0,
    cycleRunning: false,
    platforms: new Map(
      platforms.map((platform) => [platform, { status: "idle", enabled: true, itemsLastRun: 0 }]),
    ),
  };
}

function entryFor(snapshot: HealthSnapshot, platform: Platform): PlatformHealth {
  let entry = snapshot.platforms.get(platform);
  if (!entry) {
    entry = { status: "idle", enabled: true, itemsLastRun: 0 };
    snapshot.platforms.set(platform, entry);
  }
  return entry;
}

export function updateHealthOnStart(snapshot: HealthSnapshot, platform: Platform, now: number): void {
  entryFor(snapshot, platform).lastAttemptAt = now;
}

export function updateHealthOnSuccess(snapshot: HealthSnapshot, platform: Platform, items: number, now: number): void {
  const entry = entryFor(snapshot, platform);
  entry.status = "ok";
  entry.lastSuccessAt = now;
  entry.lastError = undefined;
  entry.retryAt = undefined;
  entry.itemsLastRun = items;
}

export function updateHealthOnFailure(
  snapshot: HealthSnapshot,
  platform: Platform,
  status: Exclude<PlatformStatus, "idle" | "ok">,
  message: string,
  details: { retryAt?: number; disable?: boolean; items?: number } = {},
): void {
  const entry = entryFor(snapshot, platform);
  entry.status = status;
  entry.lastError = message;
  entry.retryAt = details.retryAt;
  entry.itemsLastRun = details.items ?? 0;
  if (details.disable) {
    entry.enabled = false;
  }
}

export function isPollable(snapshot: HealthSnapshot, platform: Platform, now: number): boolean {
  const entry = snapshot.platforms.get(platform);
  if (!entry) {
    return true;
  }
  if (!entry.enabled) {
    return false;
  }
  return entry.retryAt === undefined || now >= entry.retryAt;
}

const iso = (value?: number): string | null => (value === undefined ? null : new Date(value).toISOString());

export function buildPlatformStatus(snapshot: HealthSnapshot) {
  return Array.from(snapshot.platforms.entries()).map(([platform, entry]) => ({
    platform,
    status: entry.status,
    enabled: entry.enabled,
    lastAttemptAt: iso(entry.lastAttemptAt),
    lastSuccessAt: iso(entry.lastSuccessAt),
    lastError: entry.lastError ?? null,
    retryAt: iso(entry.retryAt),
    itemsLastRun: entry.itemsLastRun,
  }));
}

export function buildHealthPayload(snapshot: HealthSnapshot, orchestratorId: string, now = Date.now()) {
  const platforms = buildPlatformStatus(snapshot);
  const healthy = platforms.filter((platform) => platform.enabled && platform.status !== "error");
  let status: "ok" | "degraded" | "down" = "ok";
  if (healthy.length === 0) {
    status = "down";
  } else if (platforms.some((platform) => platform.status !== "ok" && platform.status !== "idle")) {
    status = "degraded";
  }

  return {
    status,
    orchestratorId,
    uptimeSeconds: Math.round((now - snapshot.startTime) / 1000),
    cyclesCompleted: snapshot.cyclesCompleted,
    cycleRunning: snapshot.cycleRunning,
    lastCycleAt: iso(snapshot.lastCycleAt),
    platforms,
  };
}
