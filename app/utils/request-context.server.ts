/**
 * Request context utilities for propagating requestId through route modules
 */

import { generateRequestId } from "./logger.server";

/**
 * Get the X-Request-ID header, or generate a new id when it is missing
 */
export function getRequestId(request: Request): string {
  const existingId = request.headers.get("X-Request-ID");
  if (existingId) {
    return existingId;
  }
  return generateRequestId();
}

export function addRequestIdHeader<R extends { headers: Headers }>(response: R, requestId: string): R {
  response.headers.set("X-Request-ID", requestId);
  return response;
}
