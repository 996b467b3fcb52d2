/**
 * Listing Data Fetcher (RESO Web API)
 *
 * One attempt per call. Every failure (not configured, no match, HTTP error,
 * timeout, malformed body) is logged and returned as null; the conversation
 * carries on with a "not found" reply.
 */

import { loadAppConfig } from "~/utils/env.server";
import { logger, createLogContext } from "~/utils/logger.server";
import type { ListingRecord } from "./design/types";

const LISTING_TIMEOUT_MS = 10_000;

export interface FetchListingOptions {
  endpoint?: string | null;
  apiKey?: string | null;
  idField?: string;
  timeoutMs?: number;
  requestId?: string;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

export function buildListingQueryUrl(endpoint: string, idField: string, identifier: string): string {
  const filter = `${idField} eq '${identifier}'`;
  return `${endpoint}/Property?$filter=${encodeURIComponent(filter)}`;
}

export async function fetchListing(
  identifier: string,
  options: FetchListingOptions = {}
): Promise<ListingRecord | null> {
  const config = loadAppConfig();
  const endpoint = options.endpoint === undefined ? config.resoEndpoint : options.endpoint;
  const apiKey = options.apiKey === undefined ? config.resoApiKey : options.apiKey;
  const idField = options.idField ?? config.resoIdField;
  const timeoutMs = options.timeoutMs ?? LISTING_TIMEOUT_MS;

  const logContext = createLogContext("listing", options.requestId ?? "listing", "fetch", {
    listingId: identifier,
  });

  if (!endpoint || !apiKey) {
    logger.warn(logContext, "RESO_API_ENDPOINT / RESO_API_KEY not set; listing lookup disabled");
    return null;
  }

  // Identifiers go into an OData string literal
  if (!/^\d+$/.test(identifier)) {
    logger.warn({ ...logContext, stage: "invalid-id" }, "Listing identifier is not numeric");
    return null;
  }

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const resp = await fetch(buildListingQueryUrl(endpoint, idField, identifier), {
      method: "GET",
      headers: {
        Authorization: `Bearer ${apiKey}`,
        Accept: "application/json",
      },
      signal: controller.signal,
    });

    if (!resp.ok) {
      logger.warn({ ...logContext, stage: "bad-status", status: resp.status }, "Listings service returned non-OK response");
      return null;
    }

    const body: unknown = await resp.json();
    if (!isPlainObject(body) || !Array.isArray(body.value)) {
      logger.warn({ ...logContext, stage: "parse" }, "Listings response has no value array");
      return null;
    }

    const first: unknown = body.value[0];
    if (!isPlainObject(first)) {
      logger.info({ ...logContext, stage: "no-match" }, `No property found with MLS ID ${identifier}`);
      return null;
    }

    logger.info({ ...logContext, stage: "complete", fieldCount: Object.keys(first).length }, "Listing fetched");
    return first;
  } catch (error) {
    const stage = error instanceof Error && error.name === "AbortError" ? "timeout" : "error";
    logger.warn({ ...logContext, stage }, "Listing fetch failed", error);
    return null;
  } finally {
    clearTimeout(timeoutId);
  }
}
