import { IngestionError, errorMessage } from "../errors";
import { SchemaValidationCache, formatSchemaErrors } from "../schemas";
import kevCatalogSchema from "../schemas/kev_catalog.schema.json";
import type { KevCatalog, KevEntry } from "./threat_intel.types";

/**
 * Parses an already downloaded CISA KEV catalog.
 *
 * @param input - Raw JSON text or the decoded document
 * @param source - Name used in error messages
 * @throws IngestionError when the text is not JSON or the document does not match the catalog schema
 */
export function parseKevCatalog(input: unknown, source: string = "KEV catalog"): KevEntry[] {
  let document: unknown = input;
  if (typeof input === "string") {
    try {
      document = JSON.parse(input);
    } catch (error) {
      throw new IngestionError(source, errorMessage(error));
    }
  }

  const validate = SchemaValidationCache.getValidator<KevCatalog>("kev_catalog", kevCatalogSchema);
  if (!validate(document)) {
    const details = formatSchemaErrors(validate.errors).map((e) => `${e.field} ${e.message}`);
    throw new IngestionError(source, details.join("; "));
  }

  return document.vulnerabilities.map((entry) => ({
    cveId: entry.cveID,
    dateAdded: entry.dateAdded,
    ransomwareUse: entry.knownRansomwareCampaignUse === "Known",
  }));
}
