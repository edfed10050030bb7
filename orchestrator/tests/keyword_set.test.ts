import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";

import { KeywordSetError } from "../src/orchestrator/errors.js";
import { loadKeywordSet, normalizeText, parseKeywordSet } from "../src/orchestrator/keyword_set.js";
import { buildKeywordSet } from "./fixtures.js";

const shipped = fileURLToPath(new URL("../config/keywords.json", import.meta.url));

describe("normalizeText", () => {
  it("folds case, apostrophes, compatibility forms and whitespace", () => {
    expect(normalizeText("  S’mores  OREO\tＤｏｕｂｌｅ  ")).toBe("s'mores oreo double");
  });
});

describe("parseKeywordSet", () => {
  it("adds the canonical name as its own alias", () => {
    const keywordSet = buildKeywordSet();

    expect(keywordSet.version).toBe("test-1");
    expect(keywordSet.categories.product[1]).toEqual({
      canonical: "Oreo Double Stuf",
      aliases: ["oreo double stuf", "double stuf"],
    });
    expect(keywordSet.categories.flavor[0]).toEqual({ canonical: "golden", aliases: ["golden"] });
  });

  it("returns a deeply frozen value", () => {
    const keywordSet = buildKeywordSet();

    expect(Object.isFrozen(keywordSet)).toBe(true);
    expect(Object.isFrozen(keywordSet.categories.product)).toBe(true);
    expect(Object.isFrozen(keywordSet.categories.product[0]?.aliases)).toBe(true);
  });

  it("rejects an alias shared by two canonical names in one category", () => {
    const attempt = () =>
      parseKeywordSet({
        version: "1",
        categories: {
          product: [
            { canonical: "Oreo Original", aliases: ["oreo"] },
            { canonical: "Oreo Thins", aliases: ["OREO"] },
          ],
          flavor: [],
        },
      });

    expect(attempt).toThrow(KeywordSetError);
    expect(attempt).toThrow('product alias "oreo" maps to both "Oreo Original" and "Oreo Thins"');
  });

  it("allows the same word in different categories", () => {
    const keywordSet = parseKeywordSet({
      version: "1",
      categories: {
        product: [{ canonical: "Golden" }],
        flavor: [{ canonical: "golden" }],
      },
    });

    expect(keywordSet.categories.product[0]?.aliases).toEqual(["golden"]);
    expect(keywordSet.categories.flavor[0]?.aliases).toEqual(["golden"]);
  });

  it("rejects empty and duplicate canonical names", () => {
    expect(() =>
      parseKeywordSet({ version: "1", categories: { product: [{ canonical: "  " }], flavor: [] } }),
    ).toThrow("product[0] has an empty canonical name");

    expect(() =>
      parseKeywordSet({
        version: "1",
        categories: { product: [], flavor: [{ canonical: "Mint" }, { canonical: "mint" }] },
      }),
    ).toThrow('flavor lists "mint" more than once');
  });

  it("rejects documents of the wrong shape", () => {
    expect(() => parseKeywordSet({ version: "1", categories: { product: [] } })).toThrow(KeywordSetError);
  });
});

describe("loadKeywordSet", () => {
  it("loads the shipped keyword file", async () => {
    const keywordSet = await loadKeywordSet(shipped);

    expect(keywordSet.categories.product.map((entry) => entry.canonical)).toEqual([
      "Oreo Original",
      "Oreo Double Stuf",
      "Oreo Thins",
      "Oreo Golden",
      "Oreo Mega Stuf",
      "Oreo Cakesters",
      "Oreo Bites",
    ]);
    expect(keywordSet.categories.flavor).toHaveLength(35);
  });

  it("reports a missing file as a keyword set error", async () => {
    await expect(loadKeywordSet("/nonexistent/keywords.json")).rejects.toBeInstanceOf(KeywordSetError);
  });
});
