import type { Platform, RawItemKind } from "@mention-pulse/collector";
import { compareStrings } from "./count_store.js";
import type { AggregateCountView, ExecutiveSummary } from "./types.js";

const TOP_FLAVORS = 10;
const TOP_VIDEOS = 5;

export function roundPercentage(part: number, whole: number): number {
  if (whole === 0) {
    return 0;
  }
  return Math.round((part / whole) * 1000) / 10;
}

export function generateSummary(view: AggregateCountView, source?: Platform, now = new Date()): ExecutiveSummary {
  const filter = source ? { source } : {};

  const itemsByKind: Record<RawItemKind, number> = { tweet: 0, video: 0, comment: 0 };
  let totalItems = 0;
  for (const entry of view.itemTotals(filter)) {
    itemsByKind[entry.kind] += entry.count;
    totalItems += entry.count;
  }
  const products = view.totals({ ...filter, category: "product" });
  const flavors = view.totals({ ...filter, category: "flavor" });

  const productMentions = products.reduce((acc, entry) => acc + entry.count, 0);
  const flavorMentions = flavors.reduce((acc, entry) => acc + entry.count, 0);

  const pairs = new Map<string, { product: string; flavor: string; mentions: number }>();
  for (const entry of view.coMentions(filter)) {
    const key = JSON.stringify([entry.product, entry.flavor]);
    const existing = pairs.get(key);
    if (existing) {
      existing.mentions += entry.count;
    } else {
      pairs.set(key, { product: entry.product, flavor: entry.flavor, mentions: entry.count });
    }
  }

  const summary: Omit<ExecutiveSummary, "summary"> = {
    source: source ?? "all",
    generatedAt: now.toISOString(),
    totalItems,
    itemsByKind,
    totalMentions: productMentions + flavorMentions,
    productsMentioned: products.length,
    mostDiscussedProduct: products[0]?.keyword ?? null,
    popularFlavor: flavors[0]?.keyword ?? null,
    productShare: products.map((entry) => ({
      product: entry.keyword,
      mentions: entry.count,
      percentage: roundPercentage(entry.count, productMentions),
    })),
    topFlavors: flavors.slice(0, TOP_FLAVORS).map((entry) => ({ flavor: entry.keyword, mentions: entry.count })),
    flavorByProduct: Array.from(pairs.values()).sort(
      (a, b) =>
        b.mentions - a.mentions || compareStrings(a.product, b.product) || compareStrings(a.flavor, b.flavor),
    ),
    topVideos: source === "twitter" ? [] : view.topVideos(TOP_VIDEOS),
  };

  return { ...summary, summary: buildCombinedSummary(summary) };
}

function buildCombinedSummary(data: Omit<ExecutiveSummary, "summary">): string {
  const lines: string[] = [];
  const scope = data.source === "all" ? "all sources" : data.source;

  lines.push(`${data.totalItems} items from ${scope} produced ${data.totalMentions} mentions.`);

  if (data.mostDiscussedProduct) {
    const share = data.productShare[0];
    lines.push(
      `Most discussed product: ${data.mostDiscussedProduct}${share ? ` (${share.percentage}% of product mentions)` : ""}.`,
    );
  }

  if (data.popularFlavor) {
    lines.push(`Most popular flavor: ${data.popularFlavor}.`);
  }

  const topPair = data.flavorByProduct[0];
  if (topPair) {
    lines.push(`Top pairing: ${topPair.product} with ${topPair.flavor} (${topPair.mentions}).`);
  }

  const topVideo = data.topVideos[0];
  if (topVideo && topVideo.views > 0) {
    lines.push(`Top video: ${topVideo.title} (${topVideo.views} views).`);
  }

  return lines.join(" ");
}
