import { MemoryStore } from "../store";
import {
  AssetContextProvider,
  analyzeAsset,
  classifyCriticality,
  classifyExposure,
  exposureRank,
  isPrivateAddress,
} from "./context_analyzer";
import type { AssetDescription } from "./context_analyzer.types";
import type { Logger } from "../logger";

function createMockLogger(): jest.Mocked<Logger> {
  return { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

describe("context analyzer", () => {
  describe("classifyCriticality", () => {
    it.each([
      ["Payment Gateway", "CRITICAL"],
      ["financial-reporting", "CRITICAL"],
      ["Postgres DATABASE", "HIGH"],
      ["auth-service", "HIGH"],
      ["webapp", "MEDIUM"],
      ["print server", "LOW"],
      ["", "LOW"],
    ])("should classify %s as %s", (assetType, expected) => {
      expect(classifyCriticality(assetType)).toBe(expected);
    });

    it("should let the first matching rule win", () => {
      expect(classifyCriticality("web payment portal")).toBe("CRITICAL");
      expect(classifyCriticality("web auth proxy")).toBe("HIGH");
    });
  });

  describe("isPrivateAddress", () => {
    it.each([
      ["10.1.2.3", true],
      ["172.16.0.1", true],
      ["172.31.255.255", true],
      ["172.32.0.1", false],
      ["172.15.255.255", false],
      ["192.168.10.20", true],
      ["192.169.0.1", false],
      ["8.8.8.8", false],
    ])("%s private: %s", (address, expected) => {
      expect(isPrivateAddress(address)).toBe(expected);
    });
  });

  describe("classifyExposure", () => {
    it("should be INTERNAL when every address is private", () => {
      expect(classifyExposure(["10.0.0.5", "192.168.1.1"])).toBe("INTERNAL");
    });

    it("should be INTERNAL without addresses", () => {
      expect(classifyExposure([])).toBe("INTERNAL");
    });

    it("should be INTERNET_FACING when any address is public", () => {
      expect(classifyExposure(["10.0.0.5", " 203.0.113.7 "])).toBe("INTERNET_FACING");
    });

    it("should skip values that are not IPv4 addresses", () => {
      const logger = createMockLogger();

      expect(classifyExposure(["not-an-ip", "fe80::1", "10.0.0.1"], logger)).toBe("INTERNAL");
      expect(logger.debug).toHaveBeenCalledWith('Skipping non-IPv4 address "not-an-ip"');
      expect(logger.debug).toHaveBeenCalledTimes(2);
    });
  });

  it("exposureRank should order tiers", () => {
    expect(exposureRank("INTERNAL")).toBeLessThan(exposureRank("EXTERNAL"));
    expect(exposureRank("EXTERNAL")).toBeLessThan(exposureRank("INTERNET_FACING"));
    expect(exposureRank("INTERNET_FACING")).toBeLessThan(exposureRank("PUBLICLY_ACCESSIBLE"));
  });

  describe("analyzeAsset", () => {
    const base: AssetDescription = {
      id: "pay-01",
      type: "payment processor",
      ipAddresses: ["10.0.4.2"],
      businessFunctions: ["checkout"],
    };

    it("should combine criticality and exposure", () => {
      expect(analyzeAsset(base)).toEqual({
        assetId: "pay-01",
        criticality: "CRITICAL",
        exposure: "INTERNAL",
        businessFunctions: ["checkout"],
      });
    });

    it("should raise exposure to a higher declared tier", () => {
      const context = analyzeAsset({ ...base, declaredExposure: "EXTERNAL" });
      expect(context.exposure).toBe("EXTERNAL");
    });

    it("should produce PUBLICLY_ACCESSIBLE only when declared", () => {
      const context = analyzeAsset({ ...base, ipAddresses: ["198.51.100.4"], declaredExposure: "PUBLICLY_ACCESSIBLE" });
      expect(context.exposure).toBe("PUBLICLY_ACCESSIBLE");
    });

    it("should keep the inferred tier when the declared one is lower", () => {
      const context = analyzeAsset({ ...base, ipAddresses: ["198.51.100.4"], declaredExposure: "INTERNAL" });
      expect(context.exposure).toBe("INTERNET_FACING");
    });

    it("should copy business functions", () => {
      const context = analyzeAsset(base);
      context.businessFunctions.push("refunds");
      expect(base.businessFunctions).toEqual(["checkout"]);
    });
  });

  describe("AssetContextProvider", () => {
    it("should analyze registered assets", async () => {
      const assets = new MemoryStore<AssetDescription>();
      await assets.put("db-01", { id: "db-01", type: "database", ipAddresses: ["192.168.0.10"], businessFunctions: [] });
      const provider = new AssetContextProvider({ assets, logger: createMockLogger() });

      await expect(provider.getContext("db-01")).resolves.toEqual({
        assetId: "db-01",
        criticality: "HIGH",
        exposure: "INTERNAL",
        businessFunctions: [],
      });
    });

    it("should return null for unknown assets", async () => {
      const logger = createMockLogger();
      const provider = new AssetContextProvider({ assets: new MemoryStore(), logger });

      await expect(provider.getContext("ghost")).resolves.toBeNull();
      expect(logger.debug).toHaveBeenCalledWith("No asset registered for ghost");
    });
  });
});
