/**
 * Template name keywords per request category.
 *
 * A template is a candidate for a category when its display name contains the
 * keyword (case-insensitive). `other` has no keyword and always searches the
 * full catalog.
 */

import type { ListingCategory } from "~/services/design/types";

export const CATEGORY_TEMPLATE_KEYWORDS: Record<ListingCategory, string | null> = {
  just_listed: "listed",
  just_sold: "sold",
  open_house: "open house",
  general_property_ad: "property",
  other: null,
};
