import fs from "node:fs";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigError } from "./errors.js";
import type { RecruiterConfidence } from "./types.js";

const TitleKeywordsSchema = Type.Object({
  searchTerms: Type.Array(Type.String({ minLength: 1 }), { minItems: 1 }),
  strong: Type.Array(Type.String({ minLength: 1 })),
  loose: Type.Array(Type.String({ minLength: 1 })),
  exclude: Type.Array(Type.String({ minLength: 1 })),
});

export type TitleKeywords = Static<typeof TitleKeywordsSchema>;

const DEFAULT_KEYWORDS_URL = new URL("../../data/title-keywords.json", import.meta.url);

let defaultKeywords: TitleKeywords | null = null;

export function parseTitleKeywords(raw: unknown, source = "title keywords"): TitleKeywords {
  if (!Value.Check(TitleKeywordsSchema, raw)) {
    const problems = [...Value.Errors(TitleKeywordsSchema, raw)]
      .slice(0, 5)
      .map((error) => `${error.path || "/"} ${error.message}`);
    throw new ConfigError(`Invalid ${source}: ${problems.join("; ")}`);
  }
  return {
    searchTerms: raw.searchTerms.map((term) => term.trim()),
    strong: raw.strong.map((term) => term.toLowerCase()),
    loose: raw.loose.map((term) => term.toLowerCase()),
    exclude: raw.exclude.map((term) => term.trim().toLowerCase()),
  };
}

export function loadTitleKeywords(file: string | URL = DEFAULT_KEYWORDS_URL): TitleKeywords {
  if (file === DEFAULT_KEYWORDS_URL && defaultKeywords) {
    return defaultKeywords;
  }
  const text = fs.readFileSync(file, "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Title keywords at ${String(file)} are not valid JSON`, { cause: err });
  }
  const keywords = parseTitleKeywords(raw, `title keywords at ${String(file)}`);
  if (file === DEFAULT_KEYWORDS_URL) {
    defaultKeywords = keywords;
  }
  return keywords;
}

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * `auto` for a strong recruiting keyword, `manual_review` for a loose one,
 * null when the title is not a recruiting contact at all.
 */
export function classifyTitle(
  title: string | null | undefined,
  keywords: TitleKeywords,
): RecruiterConfidence | null {
  const normalized = title?.trim().toLowerCase() ?? "";
  if (!normalized) {
    return null;
  }
  if (keywords.strong.some((keyword) => normalized.includes(keyword))) {
    return "auto";
  }
  if (keywords.loose.some((keyword) => normalized.includes(keyword))) {
    return "manual_review";
  }
  return null;
}

/** Senior and executive titles, matched on whole words so "Director" never hits "cto". */
export function isExcludedTitle(title: string | null | undefined, keywords: TitleKeywords): boolean {
  const normalized = title?.trim().toLowerCase() ?? "";
  if (!normalized) {
    return false;
  }
  return keywords.exclude.some((keyword) =>
    new RegExp(`\\b${escapeRegex(keyword)}\\b`).test(normalized),
  );
}
