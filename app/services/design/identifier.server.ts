/**
 * MLS ID collection sub-dialogue helpers
 */

import { LISTING_IDENTIFIER_REQUEST } from "~/config/prompts/design-controller.prompt";

const IDENTIFIER_TRIGGER = "can you provide the mls id for the property";

const CANCEL_PATTERN =
  /^(cancel|skip|stop|never\s*mind|no|nope|none|i\s+(don'?t|do\s+not)\s+have\s+(one|it|an?\s+mls(\s+id)?))[.!]*$/i;

export const IDENTIFIER_REPROMPT =
  "I couldn't find an MLS ID in that message. Please enter the MLS ID (just the number), or say \"skip\" if you don't have one.";

export const NO_IDENTIFIER_FOLLOW_UP = "No problem. What is the property address to get started?";

export { LISTING_IDENTIFIER_REQUEST };

/**
 * True when an assistant reply asks the user for the MLS ID.
 */
export function requestsListingIdentifier(reply: string): boolean {
  return reply.toLowerCase().includes(IDENTIFIER_TRIGGER);
}

/**
 * First run of digits in free text, e.g. "it's MLS 384921 I think" -> "384921".
 */
export function extractListingIdentifier(text: string): string | null {
  const match = text.match(/\d+/);
  return match ? match[0] : null;
}

export function isIdentifierCancel(text: string): boolean {
  return CANCEL_PATTERN.test(text.trim());
}

export function listingNotFoundReply(identifier: string): string {
  return `I couldn't find a property with MLS ID ${identifier}. Please double-check the number and try again, or say "skip" to continue without one.`;
}
