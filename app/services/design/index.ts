/**
 * Production wiring of the design assistant's collaborators
 */

import { ConfigurationError, assertCoreConfig, loadAppConfig } from "~/utils/env.server";
import { logger, createLogContext } from "~/utils/logger.server";
import { fetchListing } from "../listings.server";
import { uploadChatImage } from "../image-host.server";
import { geminiDesignOracle } from "./design-oracle.server";
import { geminiListingMapper } from "./listing-mapper.server";
import { renderDesign } from "./render-orchestrator.server";
import { SessionStore } from "./session.server";
import { CATALOG_UNAVAILABLE_MESSAGE, loadCatalog } from "./template-catalog.server";
import type { DesignServices, Template } from "./types";

export function createDesignServices(): DesignServices {
  return {
    oracle: geminiDesignOracle,
    mapper: geminiListingMapper,
    fetchListing: (identifier, requestId) => fetchListing(identifier, { requestId }),
    render: (templateUid, modifications, requestId) => renderDesign(templateUid, modifications, { requestId }),
    uploadImage: (image, sessionId, requestId) => uploadChatImage(image, sessionId, requestId),
  };
}

let services: DesignServices | null = null;

export function getDesignServices(): DesignServices {
  if (!services) {
    services = createDesignServices();
  }
  return services;
}

export const sessionStore = new SessionStore(loadAppConfig().sessionTtlMs);

export type ChatReadiness = { ok: true; catalog: Template[] } | { ok: false; message: string };

/**
 * Core keys present and catalog loaded; otherwise the chat cannot start.
 */
export async function prepareChat(requestId: string): Promise<ChatReadiness> {
  const logContext = createLogContext("system", requestId, "readiness");
  try {
    assertCoreConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error({ ...logContext, missing: error.missing }, error.message);
      return { ok: false, message: error.message };
    }
    throw error;
  }

  const catalog = await loadCatalog({ requestId });
  if (!catalog) {
    return { ok: false, message: CATALOG_UNAVAILABLE_MESSAGE };
  }
  return { ok: true, catalog };
}

export { loadCatalog, CATALOG_UNAVAILABLE_MESSAGE };
export { handleTurn } from "./turn-handler.server";
export type { DesignServices } from "./types";
