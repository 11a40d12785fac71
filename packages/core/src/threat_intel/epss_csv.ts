import { parse } from "csv-parse/sync";
import { IngestionError, errorMessage } from "../errors";
import { clampProbability } from "./intelligence_provider";
import type { EpssEntry, EpssParseResult } from "./threat_intel.types";

type EpssRow = Record<string, string | undefined>;

function toProbability(value: string | undefined): number | undefined {
  if (value === undefined || value === "") return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? clampProbability(parsed) : undefined;
}

/**
 * Parses an EPSS scores CSV (`cve,epss,percentile`).
 *
 * Lines starting with `#` (the model version banner) are ignored. Rows without
 * a CVE id or a numeric epss are counted as skipped.
 */
export function parseEpssCsv(text: string, source: string = "EPSS scores"): EpssParseResult {
  let rows: EpssRow[];
  try {
    rows = parse(text, {
      columns: true,
      comment: "#",
      skip_empty_lines: true,
      trim: true,
    });
  } catch (error) {
    throw new IngestionError(source, errorMessage(error));
  }

  const entries: EpssEntry[] = [];
  let skipped = 0;

  for (const row of rows) {
    const cveId = row["cve"];
    const epss = toProbability(row["epss"]);
    if (!cveId || epss === undefined) {
      skipped++;
      continue;
    }
    const percentile = toProbability(row["percentile"]);
    entries.push(percentile === undefined ? { cveId, epss } : { cveId, epss, percentile });
  }

  return { entries, skipped };
}
