/**
 * Template selection for the listing pipeline
 *
 * Candidates come from the category keyword filter; each is mapped on its
 * own and the longest modification list wins (first one on ties).
 */

import { CATEGORY_TEMPLATE_KEYWORDS } from "~/config/template-categories.config";
import { logger, createLogContext } from "~/utils/logger.server";
import { layerKey } from "./design-context.server";
import { sanitizeModifications } from "./listing-mapper.server";
import { formatPriceText } from "./price-format.server";
import type { ListingCategory, ListingMapper, ListingRecord, Modification, Template } from "./types";

/** RESO field -> layer name, used when every oracle mapping fails */
export const RESO_FIELD_LAYERS: ReadonlyArray<readonly [field: string, layer: string]> = [
  ["StreetAddress", "address"],
  ["City", "city"],
  ["StateOrProvince", "state"],
  ["PostalCode", "zip"],
  ["ListPrice", "price"],
  ["BedroomsTotal", "bedrooms"],
  ["BathroomsTotalInteger", "bathrooms"],
  ["PublicRemarks", "description"],
];

export interface TemplateCandidate {
  template: Template;
  modifications: Modification[];
}

export type DesignPlan =
  | {
      ok: true;
      template: Template;
      modifications: Modification[];
      missingFields: string[];
      source: "oracle" | "field-table";
    }
  | { ok: false; reason: "no-mapping" };

export function filterTemplatesByCategory(catalog: readonly Template[], category: ListingCategory): Template[] {
  const keyword = CATEGORY_TEMPLATE_KEYWORDS[category];
  if (!keyword) return [...catalog];

  const matches = catalog.filter((template) => template.name.toLowerCase().includes(keyword));
  return matches.length > 0 ? matches : [...catalog];
}

/**
 * Longest list wins; the earliest candidate keeps a tie.
 */
export function selectBestTemplate(candidates: readonly TemplateCandidate[]): TemplateCandidate | null {
  let best: TemplateCandidate | null = null;
  for (const candidate of candidates) {
    if (!best || candidate.modifications.length > best.modifications.length) {
      best = candidate;
    }
  }
  return best;
}

/**
 * Text layers with no modification, in template order.
 */
export function computeMissingFields(template: Template, modifications: readonly Modification[]): string[] {
  const filled = new Set(modifications.map((modification) => layerKey(modification.name)));
  return template.layers
    .filter((layer) => layer.type === "text" && !filled.has(layerKey(layer.name)))
    .map((layer) => layer.name);
}

function fieldText(value: unknown): string | null {
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  if (typeof value === "string" && value.trim()) return value.trim();
  return null;
}

export function mapListingByFieldTable(listing: ListingRecord, template: Template): Modification[] {
  const raw: Modification[] = [];
  for (const [field, layer] of RESO_FIELD_LAYERS) {
    const text = fieldText(listing[field]);
    if (text === null) continue;
    raw.push({ name: layer, text: field === "ListPrice" ? formatPriceText(text) : text });
  }
  return sanitizeModifications(raw, template);
}

export async function planDesignFromListing(
  listing: ListingRecord,
  requestText: string,
  catalog: readonly Template[],
  mapper: ListingMapper,
  requestId: string
): Promise<DesignPlan> {
  const logContext = createLogContext("mapping", requestId, "plan");

  const category = await mapper.categorize(requestText, requestId);
  const candidates = filterTemplatesByCategory(catalog, category);
  logger.info(
    { ...logContext, stage: "candidates", category, candidateCount: candidates.length },
    `Mapping listing onto ${candidates.length} template(s)`
  );

  const mapped: TemplateCandidate[] = [];
  for (const template of candidates) {
    const modifications = await mapper.mapListingToTemplate(listing, template, requestId);
    if (modifications) {
      mapped.push({ template, modifications });
    }
  }

  let source: "oracle" | "field-table" = "oracle";
  let best = selectBestTemplate(mapped);

  if (!best || best.modifications.length === 0) {
    logger.warn({ ...logContext, stage: "fallback", mappedCount: mapped.length }, "No oracle mapping; using RESO field table");
    source = "field-table";
    best = selectBestTemplate(
      candidates.map((template) => ({ template, modifications: mapListingByFieldTable(listing, template) }))
    );
  }

  if (!best || best.modifications.length === 0) {
    logger.warn({ ...logContext, stage: "no-mapping" }, "Listing could not be mapped onto any template");
    return { ok: false, reason: "no-mapping" };
  }

  const missingFields = computeMissingFields(best.template, best.modifications);
  logger.info(
    {
      ...logContext,
      stage: "selected",
      templateUid: best.template.uid,
      source,
      modificationCount: best.modifications.length,
      missingCount: missingFields.length,
    },
    `Selected template "${best.template.name}"`
  );

  return { ok: true, template: best.template, modifications: best.modifications, missingFields, source };
}
