/**
 * Template Catalog Loader
 *
 * Loads every template with its layers once per process. A failed load is
 * not cached; callers treat null as fatal and stop serving chat.
 */

import { BannerbearClient, type BannerbearTemplateSummary } from "../bannerbear.server";
import { logger, createLogContext } from "~/utils/logger.server";
import type { Template } from "./types";

export const CATALOG_UNAVAILABLE_MESSAGE =
  "Application cannot start because design templates could not be loaded. Please ensure your BANNERBEAR_API_KEY is correct and restart.";

export interface CatalogClient {
  listTemplates(): Promise<BannerbearTemplateSummary[]>;
  getTemplate(uid: string): Promise<Template>;
}

let cachedCatalog: Template[] | null = null;
let inflight: Promise<Template[] | null> | null = null;

export interface LoadCatalogOptions {
  /** Defaults to BannerbearClient.fromEnv(); null means "not configured" */
  client?: CatalogClient | null;
  requestId?: string;
}

export async function loadCatalog(options: LoadCatalogOptions = {}): Promise<Template[] | null> {
  if (cachedCatalog) return cachedCatalog;
  if (!inflight) {
    inflight = fetchCatalog(options).finally(() => {
      inflight = null;
    });
  }
  return inflight;
}

async function fetchCatalog(options: LoadCatalogOptions): Promise<Template[] | null> {
  const logContext = createLogContext("catalog", options.requestId ?? "catalog-load", "load");
  const client = options.client === undefined ? BannerbearClient.fromEnv() : options.client;

  if (!client) {
    logger.error(logContext, "BANNERBEAR_API_KEY not set; template catalog unavailable");
    return null;
  }

  let summaries: BannerbearTemplateSummary[];
  try {
    summaries = await client.listTemplates();
  } catch (error) {
    logger.error({ ...logContext, stage: "summary" }, "Failed to load template summary", error);
    return null;
  }

  const templates: Template[] = [];
  for (const summary of summaries) {
    try {
      templates.push(await client.getTemplate(summary.uid));
    } catch (error) {
      logger.warn(
        { ...logContext, stage: "detail", templateUid: summary.uid },
        "Skipping template whose detail could not be loaded",
        error
      );
    }
  }

  if (templates.length === 0) {
    logger.error({ ...logContext, stage: "empty", summaryCount: summaries.length }, "No template details loaded");
    return null;
  }

  logger.info({ ...logContext, stage: "complete", templateCount: templates.length }, "Template catalog loaded");
  cachedCatalog = templates;
  return templates;
}

/** Drops the process cache. Used by tests. */
export function resetCatalogCache(): void {
  cachedCatalog = null;
  inflight = null;
}
