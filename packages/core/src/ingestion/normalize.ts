import { isValid, parseISO } from "date-fns";
import type { Logger } from "../logger";
import type { NormalizedVulnerability, RawVulnerability } from "./ingestion.types";

const ID_FIELDS = ["id", "cve_id", "cveId", "vulnerability_id"];
const TITLE_FIELDS = ["title", "summary"];
const SCORE_FIELDS = ["cvss_score", "cvssScore", "baseScore"];
const DATE_FIELDS = ["published_date", "publishedAt", "date"];
const ASSET_FIELDS = ["asset_id", "assetId"];

const TITLE_MAX_LENGTH = 100;
const DEFAULT_SEVERITY = "medium";

const TRUE_VALUES = new Set(["true", "yes", "1"]);
const FALSE_VALUES = new Set(["false", "no", "0", ""]);

function text(value: unknown): string | undefined {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed === "" ? undefined : trimmed;
  }
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return undefined;
}

function firstText(raw: RawVulnerability, fields: readonly string[]): string | undefined {
  for (const field of fields) {
    const value = text(raw[field]);
    if (value !== undefined) return value;
  }
  return undefined;
}

function firstPresent(raw: RawVulnerability, fields: readonly string[]): unknown {
  for (const field of fields) {
    const value = raw[field];
    if (value !== undefined && value !== null && value !== "") return value;
  }
  return undefined;
}

/**
 * Parses a numeric CVSS score. Missing or non-numeric values become 0.
 */
export function parseScore(value: unknown): number {
  const parsed = typeof value === "number" ? value : Number(text(value) ?? 0);
  return Number.isFinite(parsed) ? parsed : 0;
}

/**
 * Parses a yes/no flag the way spreadsheets and JSON exports write it.
 * Unrecognized values are left undefined.
 */
export function parseFlag(value: unknown): boolean | undefined {
  if (typeof value === "boolean") return value;
  if (typeof value === "number") return value === 1 ? true : value === 0 ? false : undefined;
  if (typeof value !== "string") return undefined;

  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  return undefined;
}

/**
 * Maps one raw record onto the normalized shape, or returns null when it has no id.
 */
export function normalizeVulnerability(raw: RawVulnerability, logger?: Logger): NormalizedVulnerability | null {
  const id = firstText(raw, ID_FIELDS);
  if (!id) {
    logger?.debug("Dropping vulnerability without an id");
    return null;
  }

  const description = text(raw["description"]) ?? "";
  const title = firstText(raw, TITLE_FIELDS) ?? description.slice(0, TITLE_MAX_LENGTH);
  const severity = (text(raw["severity"]) ?? DEFAULT_SEVERITY).toLowerCase();
  const baseScore = parseScore(firstPresent(raw, SCORE_FIELDS));

  let publishedAt = firstText(raw, DATE_FIELDS);
  if (publishedAt !== undefined && !isValid(parseISO(publishedAt))) {
    logger?.warn(`Ignoring unparseable publication date "${publishedAt}" on ${id}`);
    publishedAt = undefined;
  }

  const hasKnownExploit = parseFlag(raw["has_exploit"] ?? raw["hasKnownExploit"]);
  const observedInWild = parseFlag(raw["in_wild"] ?? raw["observedInWild"]);
  const assetId = firstText(raw, ASSET_FIELDS);

  return {
    id,
    title,
    severity,
    baseScore,
    ...(publishedAt !== undefined && { publishedAt }),
    ...(hasKnownExploit !== undefined && { hasKnownExploit }),
    ...(observedInWild !== undefined && { observedInWild }),
    ...(assetId !== undefined && { assetId }),
  };
}
