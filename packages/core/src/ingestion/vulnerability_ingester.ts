import { readFile } from "fs/promises";
import * as path from "path";
import { parse } from "csv-parse/sync";
import { IngestionError, UnsupportedFormatError, errorMessage } from "../errors";
import { createLogger } from "../logger";
import type { Logger } from "../logger";
import type { Store } from "../store";
import { normalizeVulnerability } from "./normalize";
import type {
  FileFormat,
  IngestFormat,
  IngestResult,
  NormalizedVulnerability,
  RawVulnerability,
  VulnerabilityIngesterDependencies,
} from "./ingestion.types";
import { INGEST_FORMATS } from "./ingestion.types";

export const DEFAULT_API_TIMEOUT_MS = 30_000;

const EXTENSION_FORMATS: Readonly<Record<string, FileFormat>> = {
  ".json": "json",
  ".csv": "csv",
};

function isRecord(value: unknown): value is RawVulnerability {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isUrl(source: string): boolean {
  return /^https?:\/\//i.test(source);
}

/**
 * Unwraps the accepted JSON shapes: a bare array, `{ vulnerabilities: [...] }`,
 * or a single record.
 */
function toRawList(document: unknown, source: string): RawVulnerability[] {
  if (Array.isArray(document)) return document.filter(isRecord);
  if (isRecord(document)) {
    const nested = document["vulnerabilities"];
    return Array.isArray(nested) ? nested.filter(isRecord) : [document];
  }
  throw new IngestionError(source, "expected a JSON object or array");
}

/**
 * Reads vulnerability exports (JSON, CSV or a JSON API) and maps their
 * varying field names onto NormalizedVulnerability.
 */
export class VulnerabilityIngester {
  private readonly logger: Logger;
  private readonly timeoutMs: number;

  constructor(deps: VulnerabilityIngesterDependencies = {}) {
    this.logger = deps.logger ?? createLogger("[ingest] ");
    this.timeoutMs = deps.timeoutMs ?? DEFAULT_API_TIMEOUT_MS;
  }

  parseJson(text: string, source: string = "JSON input"): RawVulnerability[] {
    let document: unknown;
    try {
      document = JSON.parse(text);
    } catch (error) {
      throw new IngestionError(source, errorMessage(error));
    }
    return toRawList(document, source);
  }

  parseCsv(text: string, source: string = "CSV input"): RawVulnerability[] {
    try {
      const rows: Record<string, string>[] = parse(text, {
        columns: true,
        skip_empty_lines: true,
        trim: true,
      });
      return rows;
    } catch (error) {
      throw new IngestionError(source, errorMessage(error));
    }
  }

  async fetchFromApi(url: string): Promise<RawVulnerability[]> {
    let response: Response;
    try {
      response = await fetch(url, {
        headers: { accept: "application/json" },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new IngestionError(url, errorMessage(error));
    }

    if (!response.ok) {
      throw new IngestionError(url, `HTTP ${response.status} ${response.statusText}`.trim());
    }

    let document: unknown;
    try {
      document = await response.json();
    } catch (error) {
      throw new IngestionError(url, errorMessage(error));
    }
    return toRawList(document, url);
  }

  /**
   * Normalizes raw records, dropping those without an id.
   */
  normalize(raws: readonly RawVulnerability[]): NormalizedVulnerability[] {
    const processed: NormalizedVulnerability[] = [];
    for (const raw of raws) {
      const normalized = normalizeVulnerability(raw, this.logger);
      if (normalized) processed.push(normalized);
    }

    this.logger.info(`Processed ${processed.length} vulnerabilities`);
    return processed;
  }

  /**
   * Reads a JSON or CSV file. With `auto`, the extension decides.
   *
   * @throws UnsupportedFormatError when the format cannot be determined
   * @throws IngestionError when the file cannot be read or parsed
   */
  async ingestFile(filePath: string, format: FileFormat | "auto" = "auto"): Promise<RawVulnerability[]> {
    const resolved = format === "auto" ? this.detectFormat(filePath) : format;

    let content: string;
    try {
      content = await readFile(filePath, "utf-8");
    } catch (error) {
      throw new IngestionError(filePath, errorMessage(error));
    }

    return resolved === "json" ? this.parseJson(content, filePath) : this.parseCsv(content, filePath);
  }

  /**
   * Reads raw records from a file or, for `api` or an http(s) URL under `auto`, an API endpoint.
   */
  async ingestSource(source: string, format: string = "auto"): Promise<RawVulnerability[]> {
    if (!isIngestFormat(format)) {
      throw new UnsupportedFormatError(format, INGEST_FORMATS);
    }
    if (format === "api" || (format === "auto" && isUrl(source))) {
      return this.fetchFromApi(source);
    }
    return this.ingestFile(source, format);
  }

  /**
   * Normalizes raw records and writes them to the store, keyed by id.
   */
  async ingestInto(
    store: Store<NormalizedVulnerability>,
    raws: readonly RawVulnerability[]
  ): Promise<IngestResult> {
    const normalized = this.normalize(raws);
    for (const vulnerability of normalized) {
      await store.put(vulnerability.id, vulnerability);
    }
    return { count: normalized.length, skipped: raws.length - normalized.length };
  }

  private detectFormat(filePath: string): FileFormat {
    const extension = path.extname(filePath).toLowerCase();
    const format = EXTENSION_FORMATS[extension];
    if (!format) {
      throw new UnsupportedFormatError(extension || filePath, Object.keys(EXTENSION_FORMATS));
    }
    return format;
  }
}

export function isIngestFormat(value: string): value is IngestFormat {
  return (INGEST_FORMATS as readonly string[]).includes(value);
}
