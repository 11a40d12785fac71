import * as path from "path";
import { IngestionError } from "../errors";
import type { Logger } from "../logger";
import { MemoryStore } from "../store";
import { ThreatIntelImporter, loadEpssFile, loadKevCatalogFile } from "./threat_intel_importer";
import type { ThreatIntelRecord } from "./threat_intel.types";

const fixtures = path.join(__dirname, "__fixtures__");
const NOW = new Date("2024-06-01T12:00:00.000Z");

function createMockLogger(): jest.Mocked<Logger> {
  return { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

describe("ThreatIntelImporter", () => {
  let intel: MemoryStore<ThreatIntelRecord>;
  let logger: jest.Mocked<Logger>;
  let importer: ThreatIntelImporter;

  beforeEach(() => {
    intel = new MemoryStore<ThreatIntelRecord>();
    logger = createMockLogger();
    importer = new ThreatIntelImporter({ intel, logger, clock: () => NOW });
  });

  it("should merge KEV and EPSS entries per CVE", async () => {
    const summary = await importer.import({
      kev: [{ cveId: "CVE-2024-10001", dateAdded: "2024-05-20", ransomwareUse: true }],
      epss: [
        { cveId: "CVE-2024-10001", epss: 0.9712, percentile: 0.9985 },
        { cveId: "CVE-2024-30003", epss: 0.00043 },
      ],
    });

    expect(summary).toEqual({ kevEntries: 1, epssEntries: 2, total: 2 });
    expect(await intel.get("CVE-2024-10001")).toEqual({
      cveId: "CVE-2024-10001",
      knownExploited: true,
      kevDateAdded: "2024-05-20",
      ransomwareUse: true,
      epss: 0.9712,
      percentile: 0.9985,
      updatedAt: "2024-06-01T12:00:00.000Z",
    });
    expect(await intel.get("CVE-2024-30003")).toEqual({
      cveId: "CVE-2024-30003",
      knownExploited: false,
      epss: 0.00043,
      updatedAt: "2024-06-01T12:00:00.000Z",
    });
    expect(logger.info).toHaveBeenCalledWith("Imported 1 KEV and 2 EPSS entries (2 CVEs)");
  });

  it("should keep the KEV flag when a later import only carries EPSS", async () => {
    await importer.import({ kev: [{ cveId: "CVE-2023-20002", dateAdded: "2023-11-02", ransomwareUse: false }] });
    await importer.import({ epss: [{ cveId: "CVE-2023-20002", epss: 0.4 }] });

    const record = await intel.get("CVE-2023-20002");
    expect(record?.knownExploited).toBe(true);
    expect(record?.epss).toBe(0.4);
  });

  it("should report zero for an empty import", async () => {
    await expect(importer.import({})).resolves.toEqual({ kevEntries: 0, epssEntries: 0, total: 0 });
    expect(await intel.list()).toEqual([]);
  });

  it("should import the sample feeds from disk", async () => {
    const kev = await loadKevCatalogFile(path.join(fixtures, "kev_sample.json"));
    const { entries } = await loadEpssFile(path.join(fixtures, "epss_sample.csv"));

    const summary = await importer.import({ kev, epss: entries });

    expect(summary).toEqual({ kevEntries: 2, epssEntries: 2, total: 3 });
    expect((await intel.list()).sort()).toEqual(["CVE-2023-20002", "CVE-2024-10001", "CVE-2024-30003"]);
  });

  it("should wrap unreadable files in IngestionError", async () => {
    const missing = path.join(fixtures, "missing.json");
    await expect(loadKevCatalogFile(missing)).rejects.toBeInstanceOf(IngestionError);
    await expect(loadEpssFile(missing)).rejects.toThrow(`Failed to ingest ${missing}: `);
  });
});
