import type { Logger } from "../logger";
import { normalizeVulnerability, parseFlag, parseScore } from "./normalize";

function createMockLogger(): jest.Mocked<Logger> {
  return { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

describe("normalizeVulnerability", () => {
  it("should map alternative field names", () => {
    expect(
      normalizeVulnerability({
        cveId: "CVE-2024-0001",
        summary: "Heap overflow",
        severity: "HIGH",
        cvssScore: 8.1,
        publishedAt: "2024-02-10T08:00:00Z",
        assetId: "app-02",
      })
    ).toEqual({
      id: "CVE-2024-0001",
      title: "Heap overflow",
      severity: "high",
      baseScore: 8.1,
      publishedAt: "2024-02-10T08:00:00Z",
      assetId: "app-02",
    });
  });

  it("should prefer id over the other identifier fields", () => {
    expect(normalizeVulnerability({ id: "A", cve_id: "B", vulnerability_id: "C" })?.id).toBe("A");
    expect(normalizeVulnerability({ id: "  ", cve_id: "B" })?.id).toBe("B");
  });

  it("should fall back to the first 100 characters of the description", () => {
    const description = "x".repeat(150);
    const result = normalizeVulnerability({ id: "V-1", description });

    expect(result?.title).toBe("x".repeat(100));
  });

  it("should default severity, title and score", () => {
    expect(normalizeVulnerability({ id: "V-2" })).toEqual({
      id: "V-2",
      title: "",
      severity: "medium",
      baseScore: 0,
    });
  });

  it("should drop records without an id", () => {
    const logger = createMockLogger();

    expect(normalizeVulnerability({ title: "orphan" }, logger)).toBeNull();
    expect(logger.debug).toHaveBeenCalledWith("Dropping vulnerability without an id");
  });

  it("should drop unparseable dates with a warning", () => {
    const logger = createMockLogger();
    const result = normalizeVulnerability({ id: "V-3", date: "last tuesday" }, logger);

    expect(result?.publishedAt).toBeUndefined();
    expect(logger.warn).toHaveBeenCalledWith('Ignoring unparseable publication date "last tuesday" on V-3');
  });

  it("should read exploit flags", () => {
    const result = normalizeVulnerability({ id: "V-4", has_exploit: "Yes", in_wild: 0 });

    expect(result?.hasKnownExploit).toBe(true);
    expect(result?.observedInWild).toBe(false);
  });
});

describe("parseScore", () => {
  it("should parse numbers and numeric strings", () => {
    expect(parseScore(7.5)).toBe(7.5);
    expect(parseScore("9.8")).toBe(9.8);
  });

  it("should return 0 for missing or non-numeric values", () => {
    expect(parseScore(undefined)).toBe(0);
    expect(parseScore("n/a")).toBe(0);
    expect(parseScore(Number.NaN)).toBe(0);
    expect(parseScore(true)).toBe(0);
  });

  it("should keep out-of-range values for the scorer to clamp", () => {
    expect(parseScore("11.5")).toBe(11.5);
  });
});

describe("parseFlag", () => {
  it.each([
    [true, true],
    ["true", true],
    ["YES", true],
    ["1", true],
    [1, true],
    [false, false],
    ["no", false],
    ["0", false],
    ["", false],
    [0, false],
  ])("should parse %p as %p", (input, expected) => {
    expect(parseFlag(input)).toBe(expected);
  });

  it("should leave unrecognized values undefined", () => {
    expect(parseFlag("maybe")).toBeUndefined();
    expect(parseFlag(2)).toBeUndefined();
    expect(parseFlag(undefined)).toBeUndefined();
  });
});
