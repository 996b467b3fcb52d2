/**
 * Data-to-Layer Mapper (oracle side)
 *
 * Two structured calls: categorize the user's request, and map one listing
 * record onto one template's layers. Structured output is required; a text
 * reply counts as failure.
 */

import { FunctionCallingConfigMode, type FunctionDeclaration } from "@google/genai";
import {
  getGeminiModels,
  readOracleReply,
  withTimeout,
  type GeminiModels,
} from "~/utils/gemini-client.server";
import { logger, createLogContext } from "~/utils/logger.server";
import {
  CATEGORIZER_TIMEOUT_MS,
  DESIGN_ORACLE_MODEL,
  MAPPING_TIMEOUT_MS,
} from "~/config/ai-models.config";
import {
  CATEGORIZER_PROMPT_TEMPLATE,
  LISTING_MAPPER_PROMPT_TEMPLATE,
} from "~/config/prompts/listing-mapper.prompt";
import { renderPromptTemplate } from "~/config/prompts/render-prompt";
import {
  CREATE_MODIFICATIONS,
  CREATE_MODIFICATIONS_TOOL,
  SET_DESIGN_CATEGORY,
  SET_DESIGN_CATEGORY_TOOL,
} from "~/config/schemas/design-tools.schema";
import { parseModificationList } from "./decision-validator.server";
import { layerKey, upsertModifications } from "./design-context.server";
import { normalizePriceModifications } from "./price-format.server";
import {
  DEFAULT_LISTING_CATEGORY,
  LISTING_CATEGORIES,
  type ListingCategory,
  type ListingMapper,
  type ListingRecord,
  type Modification,
  type OracleReply,
  type Template,
} from "./types";

export interface MapperCallOptions {
  models?: GeminiModels;
}

function isListingCategory(value: unknown): value is ListingCategory {
  const categories: readonly unknown[] = LISTING_CATEGORIES;
  return categories.includes(value);
}

async function callForFunction(
  prompt: string,
  tool: FunctionDeclaration,
  functionName: string,
  timeoutMs: number,
  models: GeminiModels
): Promise<OracleReply> {
  const response = await withTimeout(
    models.generateContent({
      model: DESIGN_ORACLE_MODEL,
      contents: prompt,
      config: {
        tools: [{ functionDeclarations: [tool] }],
        toolConfig: {
          functionCallingConfig: {
            mode: FunctionCallingConfigMode.ANY,
            allowedFunctionNames: [functionName],
          },
        },
      },
    }),
    timeoutMs
  );
  return readOracleReply(response, functionName);
}

export async function categorizeRequest(
  requestText: string,
  requestId: string,
  options: MapperCallOptions = {}
): Promise<ListingCategory> {
  const logContext = createLogContext("mapping", requestId, "categorize");
  const prompt = renderPromptTemplate(CATEGORIZER_PROMPT_TEMPLATE, { requestText });

  try {
    const reply = await callForFunction(
      prompt,
      SET_DESIGN_CATEGORY_TOOL,
      SET_DESIGN_CATEGORY,
      CATEGORIZER_TIMEOUT_MS,
      options.models ?? getGeminiModels()
    );

    if (reply.kind !== "call") {
      logger.warn(
        { ...logContext, stage: "no-call" },
        `Categorizer gave no structured answer (${reply.kind === "none" ? reply.reason : "text"}); using ${DEFAULT_LISTING_CATEGORY}`
      );
      return DEFAULT_LISTING_CATEGORY;
    }

    const category = reply.args.category;
    if (!isListingCategory(category)) {
      logger.warn({ ...logContext, stage: "invalid" }, `Unknown category ${String(category)}; using ${DEFAULT_LISTING_CATEGORY}`);
      return DEFAULT_LISTING_CATEGORY;
    }

    logger.info({ ...logContext, stage: "complete", category }, "Request categorized");
    return category;
  } catch (error) {
    logger.error(logContext, "Categorization failed", error);
    return DEFAULT_LISTING_CATEGORY;
  }
}

/**
 * Restrict to the template's layers, rewrite names to the layer's own
 * spelling, collapse duplicates (later wins) and drop empty values.
 */
export function sanitizeModifications(raw: readonly Modification[], template: Template): Modification[] {
  const canonical = new Map(template.layers.map((layer) => [layerKey(layer.name), layer.name]));
  const kept: Modification[] = [];

  for (const modification of raw) {
    const layerName = canonical.get(layerKey(modification.name));
    if (!layerName) continue;

    const text = modification.text?.trim();
    const imageUrl = modification.image_url?.trim();
    if (!text && !imageUrl) continue;

    const cleaned: Modification = { name: layerName };
    if (text) cleaned.text = text;
    if (imageUrl) cleaned.image_url = imageUrl;
    kept.push(cleaned);
  }

  return upsertModifications([], kept);
}

/**
 * null when the oracle fails; [] when it legitimately finds nothing to map.
 */
export async function mapListingToTemplate(
  listing: ListingRecord,
  template: Template,
  requestId: string,
  options: MapperCallOptions = {}
): Promise<Modification[] | null> {
  const logContext = createLogContext("mapping", requestId, "map", { templateUid: template.uid });
  const prompt = renderPromptTemplate(LISTING_MAPPER_PROMPT_TEMPLATE, {
    templateJson: JSON.stringify(template, null, 2),
    listingJson: JSON.stringify(listing, null, 2),
  });

  try {
    const reply = await callForFunction(
      prompt,
      CREATE_MODIFICATIONS_TOOL,
      CREATE_MODIFICATIONS,
      MAPPING_TIMEOUT_MS,
      options.models ?? getGeminiModels()
    );

    if (reply.kind !== "call") {
      logger.warn(
        { ...logContext, stage: "no-call" },
        `Mapper gave no structured answer (${reply.kind === "none" ? reply.reason : "text"})`
      );
      return null;
    }

    const parsed = parseModificationList(reply.args.modifications);
    if (parsed.issues.length > 0) {
      logger.warn({ ...logContext, stage: "validate", issues: parsed.issues }, "Dropped malformed modifications");
    }

    const modifications = normalizePriceModifications(sanitizeModifications(parsed.modifications, template));
    logger.info(
      { ...logContext, stage: "complete", mapped: modifications.length, proposed: parsed.modifications.length },
      `Mapped ${modifications.length} layer(s) for "${template.name}"`
    );
    return modifications;
  } catch (error) {
    logger.error(logContext, "Listing mapping failed", error);
    return null;
  }
}

export const geminiListingMapper: ListingMapper = {
  categorize: (requestText, requestId) => categorizeRequest(requestText, requestId),
  mapListingToTemplate: (listing, template, requestId) => mapListingToTemplate(listing, template, requestId),
};
