import { promises as fs } from "fs";
import * as os from "os";
import * as path from "path";
import { IngestionError, UnsupportedFormatError } from "../errors";
import type { Logger } from "../logger";
import { MemoryStore, createFsStores } from "../store";
import { VulnerabilityIngester } from "./vulnerability_ingester";
import type { NormalizedVulnerability } from "./ingestion.types";

const fixtures = path.join(__dirname, "__fixtures__");

function createMockLogger(): jest.Mocked<Logger> {
  return { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

describe("VulnerabilityIngester", () => {
  let logger: jest.Mocked<Logger>;
  let ingester: VulnerabilityIngester;

  beforeEach(() => {
    logger = createMockLogger();
    ingester = new VulnerabilityIngester({ logger, timeoutMs: 1000 });
  });

  describe("parseJson", () => {
    it("should accept a bare array", () => {
      expect(ingester.parseJson('[{"id":"A"},{"id":"B"}]')).toEqual([{ id: "A" }, { id: "B" }]);
    });

    it("should unwrap a vulnerabilities array", () => {
      expect(ingester.parseJson('{"vulnerabilities":[{"id":"A"}]}')).toEqual([{ id: "A" }]);
    });

    it("should treat any other object as a single record", () => {
      expect(ingester.parseJson('{"id":"A","cvss_score":5}')).toEqual([{ id: "A", cvss_score: 5 }]);
    });

    it("should skip array entries that are not objects", () => {
      expect(ingester.parseJson('[{"id":"A"}, 3, null, "x"]')).toEqual([{ id: "A" }]);
    });

    it("should reject invalid JSON and scalar documents", () => {
      expect(() => ingester.parseJson("{", "scan.json")).toThrow(IngestionError);
      expect(() => ingester.parseJson("42", "scan.json")).toThrow(
        "Failed to ingest scan.json: expected a JSON object or array"
      );
    });
  });

  describe("parseCsv", () => {
    it("should return one record per row keyed by header", () => {
      expect(ingester.parseCsv("id,cvss_score\nCVE-1, 7.2\n\nCVE-2,3\n")).toEqual([
        { id: "CVE-1", cvss_score: "7.2" },
        { id: "CVE-2", cvss_score: "3" },
      ]);
    });

    it("should wrap rows with the wrong number of columns", () => {
      expect(() => ingester.parseCsv("id,cvss_score\nCVE-1,7.2,extra\n", "scan.csv")).toThrow(IngestionError);
    });
  });

  describe("ingestFile", () => {
    it("should read the JSON fixture by extension", async () => {
      const raws = await ingester.ingestFile(path.join(fixtures, "scanner_export.json"));

      expect(raws).toHaveLength(3);
      expect(ingester.normalize(raws)).toEqual([
        {
          id: "CVE-2024-10001",
          title: "Remote code execution in upload handler",
          severity: "critical",
          baseScore: 9.8,
          publishedAt: "2024-05-14",
          hasKnownExploit: true,
          assetId: "web-01",
        },
        {
          id: "VULN-7",
          title: "Verbose error pages disclose stack traces",
          severity: "medium",
          baseScore: 4.3,
        },
      ]);
      expect(logger.info).toHaveBeenCalledWith("Processed 2 vulnerabilities");
    });

    it("should read the CSV fixture by extension", async () => {
      const raws = await ingester.ingestFile(path.join(fixtures, "scanner_export.csv"));

      expect(ingester.normalize(raws)).toEqual([
        {
          id: "CVE-2024-10001",
          title: "Remote code execution in upload handler",
          severity: "high",
          baseScore: 9.8,
          publishedAt: "2024-05-14",
          hasKnownExploit: true,
          observedInWild: false,
          assetId: "web-01",
        },
        {
          id: "CVE-2023-20002",
          title: "Outdated TLS configuration",
          severity: "low",
          baseScore: 3.1,
          hasKnownExploit: false,
          observedInWild: false,
          assetId: "db-01",
        },
      ]);
    });

    it("should reject unknown extensions under auto", async () => {
      await expect(ingester.ingestFile("scan.xml")).rejects.toThrow(
        new UnsupportedFormatError(".xml", [".json", ".csv"])
      );
    });

    it("should honour an explicit format over the extension", async () => {
      await expect(ingester.ingestFile(path.join(fixtures, "scanner_export.csv"), "json")).rejects.toBeInstanceOf(
        IngestionError
      );
    });

    it("should wrap missing files", async () => {
      const missing = path.join(fixtures, "missing.json");
      await expect(ingester.ingestFile(missing)).rejects.toThrow(`Failed to ingest ${missing}: `);
    });
  });

  describe("fetchFromApi", () => {
    let fetchSpy: jest.SpyInstance;

    beforeEach(() => {
      fetchSpy = jest.spyOn(global, "fetch");
    });

    afterEach(() => {
      fetchSpy.mockRestore();
    });

    it("should unwrap the response body", async () => {
      fetchSpy.mockResolvedValue(new Response(JSON.stringify({ vulnerabilities: [{ id: "CVE-1" }] }), { status: 200 }));

      await expect(ingester.fetchFromApi("https://scanner.test/api/vulns")).resolves.toEqual([{ id: "CVE-1" }]);
      expect(fetchSpy).toHaveBeenCalledWith(
        "https://scanner.test/api/vulns",
        expect.objectContaining({ headers: { accept: "application/json" } })
      );
    });

    it("should fail on non-2xx responses", async () => {
      fetchSpy.mockResolvedValue(new Response("nope", { status: 503, statusText: "Service Unavailable" }));

      await expect(ingester.fetchFromApi("https://scanner.test/api/vulns")).rejects.toThrow(
        "Failed to ingest https://scanner.test/api/vulns: HTTP 503 Service Unavailable"
      );
    });

    it("should wrap network errors", async () => {
      fetchSpy.mockRejectedValue(new Error("connect ECONNREFUSED"));

      await expect(ingester.fetchFromApi("https://scanner.test/api/vulns")).rejects.toThrow(
        "Failed to ingest https://scanner.test/api/vulns: connect ECONNREFUSED"
      );
    });

    it("should be used for URLs under auto", async () => {
      fetchSpy.mockResolvedValue(new Response("[]", { status: 200 }));

      await expect(ingester.ingestSource("http://scanner.test/export")).resolves.toEqual([]);
      expect(fetchSpy).toHaveBeenCalledTimes(1);
    });
  });

  describe("ingestSource", () => {
    it("should reject unknown formats", async () => {
      await expect(ingester.ingestSource("scan.json", "xml")).rejects.toThrow(
        'Unsupported format "xml". Supported: auto, json, csv, api'
      );
    });

    it("should read files for explicit file formats", async () => {
      const raws = await ingester.ingestSource(path.join(fixtures, "scanner_export.json"), "json");
      expect(raws).toHaveLength(3);
    });
  });

  describe("ingestInto", () => {
    it("should persist normalized records and count the dropped ones", async () => {
      const store = new MemoryStore<NormalizedVulnerability>();

      const result = await ingester.ingestInto(store, [
        { id: "CVE-1", cvss_score: "5.0" },
        { cve_id: "CVE-2", cvss_score: 7 },
        { title: "no id" },
      ]);

      expect(result).toEqual({ count: 2, skipped: 1 });
      expect(await store.list()).toEqual(["CVE-1", "CVE-2"]);
      expect(await store.get("CVE-2")).toEqual({ id: "CVE-2", title: "", severity: "medium", baseScore: 7 });
    });

    it("should overwrite records re-ingested under the same id", async () => {
      const store = new MemoryStore<NormalizedVulnerability>();

      await ingester.ingestInto(store, [{ id: "CVE-1", cvss_score: 5 }]);
      await ingester.ingestInto(store, [{ id: "CVE-1", cvss_score: 6 }]);

      expect((await store.get("CVE-1"))?.baseScore).toBe(6);
      expect(store.size()).toBe(1);
    });

    it("should write advisory ids containing slashes to the file store", async () => {
      const root = await fs.mkdtemp(path.join(os.tmpdir(), "vulnrank-ingest-"));
      try {
        const { vulnerabilities } = createFsStores(root);

        const result = await ingester.ingestInto(vulnerabilities, [
          { id: "CVE-2024-0001", cvss_score: 5 },
          { id: "GHSA/npm/lodash-0002", cvss_score: 7.5 },
          { id: "CVE-2024-0003", cvss_score: 9 },
        ]);

        expect(result).toEqual({ count: 3, skipped: 0 });
        expect(await vulnerabilities.list()).toEqual(["CVE-2024-0001", "CVE-2024-0003", "GHSA/npm/lodash-0002"]);
        expect((await vulnerabilities.get("GHSA/npm/lodash-0002"))?.baseScore).toBe(7.5);
      } finally {
        await fs.rm(root, { recursive: true, force: true });
      }
    });
  });
});
