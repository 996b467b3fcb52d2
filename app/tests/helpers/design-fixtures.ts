/**
 * Shared test data and in-process fakes for the design assistant
 */

import { vi } from "vitest";
import type {
  DecideInput,
  DesignServices,
  ListingCategory,
  ListingRecord,
  Modification,
  OracleReply,
  RenderResult,
  StagedImage,
  Template,
} from "~/services/design/types";

export const JUST_LISTED: Template = {
  uid: "tpl-listed",
  name: "Just Listed Flyer",
  layers: [
    { name: "address", type: "text" },
    { name: "price", type: "text" },
    { name: "bedrooms", type: "text" },
    { name: "photo", type: "image" },
  ],
};

export const JUST_SOLD: Template = {
  uid: "tpl-sold",
  name: "Just Sold Banner",
  layers: [
    { name: "address", type: "text" },
    { name: "price", type: "text" },
  ],
};

export const OPEN_HOUSE: Template = {
  uid: "tpl-open",
  name: "Open House Invite",
  layers: [
    { name: "address", type: "text" },
    { name: "date", type: "text" },
  ],
};

export const CATALOG: Template[] = [JUST_LISTED, JUST_SOLD, OPEN_HOUSE];

export const LISTING: ListingRecord = {
  ListingId: "384921",
  StreetAddress: "123 Main St",
  City: "Springfield",
  ListPrice: 450000,
  BedroomsTotal: 3,
};

export function callReply(args: Record<string, unknown>): OracleReply {
  return { kind: "call", name: "process_user_request", args };
}

export interface FakeServicesOptions {
  replies?: OracleReply[];
  category?: ListingCategory;
  mappings?: Record<string, Modification[] | null>;
  listings?: Record<string, ListingRecord>;
  renderResult?: RenderResult;
  uploadUrl?: string | null;
}

/**
 * DesignServices with scripted answers. Oracle replies are consumed in order;
 * when they run out the oracle answers "none".
 */
export function createFakeServices(options: FakeServicesOptions = {}) {
  const replies = [...(options.replies ?? [])];

  const decide = vi.fn(async (_input: DecideInput): Promise<OracleReply> =>
    replies.shift() ?? { kind: "none", reason: "no scripted reply" }
  );
  const categorize = vi.fn(async (_text: string, _requestId: string): Promise<ListingCategory> =>
    options.category ?? "general_property_ad"
  );
  const mapListingToTemplate = vi.fn(
    async (_listing: ListingRecord, template: Template, _requestId: string): Promise<Modification[] | null> =>
      options.mappings && template.uid in options.mappings ? options.mappings[template.uid] : []
  );
  const fetchListing = vi.fn(
    async (identifier: string, _requestId: string): Promise<ListingRecord | null> =>
      options.listings?.[identifier] ?? null
  );
  const render = vi.fn(
    async (_templateUid: string, _modifications: Modification[], _requestId: string): Promise<RenderResult> =>
      options.renderResult ?? { ok: true, imageUrl: "https://images.example.test/render.png", renderUid: "img-1" }
  );
  const uploadImage = vi.fn(
    async (_image: StagedImage, _sessionId: string, _requestId: string): Promise<string | null> =>
      options.uploadUrl === undefined ? "https://storage.example.test/upload.png" : options.uploadUrl
  );

  const services: DesignServices = {
    oracle: { decide },
    mapper: { categorize, mapListingToTemplate },
    fetchListing,
    render,
    uploadImage,
  };

  return { services, decide, categorize, mapListingToTemplate, fetchListing, render, uploadImage };
}
