import { InvalidInputError } from "../errors";
import type { MultiplierOverrides, MultiplierTable } from "./risk_scoring.types";

export const DEFAULT_MULTIPLIER_TABLE: MultiplierTable = Object.freeze({
  criticality: Object.freeze({ LOW: 0.8, MEDIUM: 1.0, HIGH: 1.3, CRITICAL: 1.5 }),
  exposure: Object.freeze({
    INTERNAL: 1.0,
    EXTERNAL: 1.2,
    INTERNET_FACING: 1.4,
    PUBLICLY_ACCESSIBLE: 1.4,
  }),
  hasExploit: 1.3,
  inWild: 1.5,
});

function checkMultiplier(field: string, value: number): number {
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
    throw new InvalidInputError(field, value, "must be a finite, non-negative multiplier");
  }
  return value;
}

/**
 * Builds a multiplier table from partial overrides on top of a base table.
 *
 * Every multiplier must be finite and non-negative, and the
 * PUBLICLY_ACCESSIBLE exposure multiplier can never drop below
 * INTERNET_FACING.
 */
export function buildMultiplierTable(
  overrides: MultiplierOverrides = {},
  base: MultiplierTable = DEFAULT_MULTIPLIER_TABLE
): MultiplierTable {
  const criticality = { ...base.criticality, ...overrides.criticality };
  const exposure = { ...base.exposure, ...overrides.exposure };

  for (const [tier, value] of Object.entries(criticality)) {
    checkMultiplier(`multipliers.criticality.${tier}`, value);
  }
  for (const [tier, value] of Object.entries(exposure)) {
    checkMultiplier(`multipliers.exposure.${tier}`, value);
  }

  if (exposure.PUBLICLY_ACCESSIBLE < exposure.INTERNET_FACING) {
    throw new InvalidInputError(
      "multipliers.exposure.PUBLICLY_ACCESSIBLE",
      exposure.PUBLICLY_ACCESSIBLE,
      `must be >= INTERNET_FACING (${exposure.INTERNET_FACING})`
    );
  }

  return Object.freeze({
    criticality: Object.freeze(criticality),
    exposure: Object.freeze(exposure),
    hasExploit: checkMultiplier("multipliers.hasExploit", overrides.hasExploit ?? base.hasExploit),
    inWild: checkMultiplier("multipliers.inWild", overrides.inWild ?? base.inWild),
  });
}
