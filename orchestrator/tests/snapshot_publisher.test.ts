import { describe, expect, it, vi } from "vitest";
import type { Redis } from "ioredis";

import { SnapshotPublisher, type DashboardSnapshot } from "../src/orchestrator/snapshot_publisher.js";

const snapshot: DashboardSnapshot = {
  keywordSetVersion: "test-1",
  granularity: "hour",
  generatedAt: "2024-06-10T10:00:00.000Z",
  counts: [],
  summaries: {
    all: emptySummary("all"),
    twitter: emptySummary("twitter"),
    youtube: emptySummary("youtube"),
  },
  platforms: [],
};

function emptySummary(source: DashboardSnapshot["summaries"]["all"]["source"]) {
  return {
    source,
    generatedAt: "2024-06-10T10:00:00.000Z",
    totalItems: 0,
    itemsByKind: { tweet: 0, video: 0, comment: 0 },
    totalMentions: 0,
    productsMentioned: 0,
    mostDiscussedProduct: null,
    popularFlavor: null,
    productShare: [],
    topFlavors: [],
    flavorByProduct: [],
    topVideos: [],
    summary: "0 items from all sources produced 0 mentions.",
  };
}

describe("SnapshotPublisher", () => {
  it("writes the serialised snapshot with a TTL", async () => {
    const set = vi.fn().mockResolvedValue("OK");
    const publisher = new SnapshotPublisher({ set } as unknown as Redis, { key: "dashboard", ttlSeconds: 120 });

    const durationMs = await publisher.publish(snapshot);

    expect(durationMs).toBeGreaterThanOrEqual(0);
    expect(set).toHaveBeenCalledTimes(1);
    expect(set).toHaveBeenCalledWith("dashboard", JSON.stringify(snapshot), "EX", 120);
  });

  it("retries a failed write", async () => {
    const set = vi.fn().mockRejectedValueOnce(new Error("ECONNRESET")).mockResolvedValue("OK");
    const publisher = new SnapshotPublisher({ set } as unknown as Redis, {
      key: "dashboard",
      ttlSeconds: 120,
      retries: 2,
      baseDelaySeconds: 0.001,
    });

    await publisher.publish(snapshot);

    expect(set).toHaveBeenCalledTimes(2);
  });

  it("gives up after the configured retries", async () => {
    const set = vi.fn().mockRejectedValue(new Error("ECONNREFUSED"));
    const publisher = new SnapshotPublisher({ set } as unknown as Redis, {
      key: "dashboard",
      ttlSeconds: 120,
      retries: 1,
      baseDelaySeconds: 0.001,
    });

    await expect(publisher.publish(snapshot)).rejects.toThrow("ECONNREFUSED");
    expect(set).toHaveBeenCalledTimes(2);
  });
});
