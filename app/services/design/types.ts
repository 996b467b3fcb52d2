// =============================================================================
// Design assistant domain types
// =============================================================================

import type { RenderError } from "./errors";

// -----------------------------------------------------------------------------
// Templates (from the rendering service, immutable once loaded)
// -----------------------------------------------------------------------------

export type LayerType = "text" | "image" | string;

export interface TemplateLayer {
  /** Display name, used as the matching key for modifications */
  name: string;
  type: LayerType;
}

export interface Template {
  uid: string;
  name: string;
  layers: TemplateLayer[];
}

// -----------------------------------------------------------------------------
// Listing data (opaque, shape owned by the listings service)
// -----------------------------------------------------------------------------

export type ListingRecord = Record<string, unknown>;

export const LISTING_CATEGORIES = [
  "just_listed",
  "just_sold",
  "open_house",
  "general_property_ad",
  "other",
] as const;

export type ListingCategory = (typeof LISTING_CATEGORIES)[number];

export const DEFAULT_LISTING_CATEGORY: ListingCategory = "general_property_ad";

// -----------------------------------------------------------------------------
// Design context
// -----------------------------------------------------------------------------

/** One layer value. Field names follow the rendering service's wire format. */
export interface Modification {
  name: string;
  text?: string;
  image_url?: string;
}

export interface DesignContext {
  template_uid: string | null;
  modifications: Modification[];
}

// -----------------------------------------------------------------------------
// Oracle decisions (validated tagged union)
// -----------------------------------------------------------------------------

export const DESIGN_ACTIONS = ["MODIFY", "GENERATE", "RESET", "CONVERSE"] as const;

export type DesignAction = (typeof DESIGN_ACTIONS)[number];

export type DesignDecision =
  | { action: "CONVERSE"; response_text: string }
  | {
      action: "MODIFY";
      response_text: string;
      template_uid: string | null;
      modifications: Modification[];
    }
  | { action: "GENERATE"; response_text: string }
  | { action: "RESET"; response_text: string };

export type OracleReply =
  | { kind: "call"; name: string; args: Record<string, unknown> }
  | { kind: "text"; text: string }
  | { kind: "none"; reason: string };

// -----------------------------------------------------------------------------
// Conversation
// -----------------------------------------------------------------------------

export type ChatRole = "user" | "assistant";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export type SessionMode = "IDLE" | "AWAITING_IDENTIFIER";

export interface StagedImage {
  bytes: Buffer;
  contentType: string;
  filename?: string;
}

// -----------------------------------------------------------------------------
// Collaborators injected into the turn handler
// -----------------------------------------------------------------------------

export interface DecideInput {
  /** Conversation before the current user message */
  history: ChatMessage[];
  /** Current user message, possibly prefixed with image context */
  prompt: string;
  catalog: Template[];
  designContext: DesignContext;
  requestId: string;
}

export interface DesignOracle {
  decide(input: DecideInput): Promise<OracleReply>;
}

export interface ListingMapper {
  categorize(requestText: string, requestId: string): Promise<ListingCategory>;
  mapListingToTemplate(
    listing: ListingRecord,
    template: Template,
    requestId: string
  ): Promise<Modification[] | null>;
}

export type RenderResult =
  | { ok: true; imageUrl: string; renderUid: string }
  | { ok: false; error: RenderError };

export interface DesignServices {
  oracle: DesignOracle;
  mapper: ListingMapper;
  fetchListing(identifier: string, requestId: string): Promise<ListingRecord | null>;
  render(templateUid: string, modifications: Modification[], requestId: string): Promise<RenderResult>;
  uploadImage(image: StagedImage, sessionId: string, requestId: string): Promise<string | null>;
}
