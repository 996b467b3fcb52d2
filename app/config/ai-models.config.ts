/**
 * AI model configuration
 *
 * Single source of truth for the model names the assistant calls. Override
 * with DESIGN_ORACLE_MODEL to switch models without a redeploy.
 */

/**
 * Model behind every oracle call (controller, categorizer, mapper).
 * Must support function calling.
 */
export const DESIGN_ORACLE_MODEL = process.env.DESIGN_ORACLE_MODEL || "gemini-2.5-flash";

/** Controller turns are interactive; keep them shorter than mapping calls. */
export const CONTROLLER_TIMEOUT_MS = 45_000;

/** Mapping runs once per candidate template. */
export const MAPPING_TIMEOUT_MS = 60_000;

export const CATEGORIZER_TIMEOUT_MS = 20_000;

/** Number of prior chat messages sent to the controller. */
export const CONTROLLER_HISTORY_WINDOW = 8;
