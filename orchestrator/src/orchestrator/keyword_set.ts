import { readFile } from "node:fs/promises";
import { z } from "zod";
import { KeywordSetError } from "./errors.js";
import { CATEGORIES, type Category, type KeywordEntry, type KeywordSet } from "./types.js";

const EntrySchema = z.object({
  canonical: z.string(),
  aliases: z.array(z.string()).default([]),
});

const KeywordSetSchema = z.object({
  version: z.union([z.string().min(1), z.number()]).transform(String),
  categories: z.object({
    product: z.array(EntrySchema),
    flavor: z.array(EntrySchema),
  }),
});

const APOSTROPHES = /[‘’‛ʼ`´]/g;

/** Folds case, compatibility forms, typographic apostrophes and runs of whitespace. */
export function normalizeText(text: string): string {
  return text.normalize("NFKC").toLowerCase().replace(APOSTROPHES, "'").replace(/\s+/g, " ").trim();
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

function buildCategory(category: Category, entries: z.infer<typeof EntrySchema>[], issues: string[]): KeywordEntry[] {
  const canonicals = new Set<string>();
  const aliasOwners = new Map<string, string>();
  const result: KeywordEntry[] = [];

  entries.forEach((entry, index) => {
    const canonical = entry.canonical.trim();
    const canonicalKey = normalizeText(canonical);
    if (!canonicalKey) {
      issues.push(`${category}[${index}] has an empty canonical name`);
      return;
    }
    if (canonicals.has(canonicalKey)) {
      issues.push(`${category} lists "${canonical}" more than once`);
      return;
    }
    canonicals.add(canonicalKey);

    const aliases: string[] = [];
    for (const alias of [canonical, ...entry.aliases]) {
      const aliasKey = normalizeText(alias);
      if (!aliasKey) {
        issues.push(`${category} "${canonical}" has an empty alias`);
        continue;
      }
      const owner = aliasOwners.get(aliasKey);
      if (owner !== undefined && owner !== canonical) {
        issues.push(`${category} alias "${aliasKey}" maps to both "${owner}" and "${canonical}"`);
        continue;
      }
      if (owner === undefined) {
        aliasOwners.set(aliasKey, canonical);
        aliases.push(aliasKey);
      }
    }

    result.push({ canonical, aliases });
  });

  return result;
}

export function parseKeywordSet(raw: unknown): KeywordSet {
  const parsed = KeywordSetSchema.safeParse(raw);
  if (!parsed.success) {
    throw new KeywordSetError(
      "Keyword set does not match the expected shape",
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "root"}: ${issue.message}`),
    );
  }

  const issues: string[] = [];
  const categories: Record<Category, KeywordEntry[]> = { product: [], flavor: [] };
  for (const category of CATEGORIES) {
    categories[category] = buildCategory(category, parsed.data.categories[category], issues);
  }

  if (issues.length > 0) {
    throw new KeywordSetError("Keyword set is invalid", issues);
  }

  return deepFreeze({ version: parsed.data.version, categories });
}

export async function loadKeywordSet(path: string): Promise<KeywordSet> {
  let contents: string;
  try {
    contents = await readFile(path, "utf8");
  } catch (error) {
    throw new KeywordSetError(`Unable to read keyword file ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(contents);
  } catch (error) {
    throw new KeywordSetError(`Keyword file ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  return parseKeywordSet(raw);
}
