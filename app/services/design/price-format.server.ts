import type { Modification } from "./types";

// "450000", "$450000", "450,000", "$450,000.00"
const BARE_AMOUNT = /^\$?\s*(\d{1,3}(?:,\d{3})+|\d+)(?:\.0{1,2})?$/;

const PRICE_LAYER = /price/i;

/**
 * "$450,000" for bare whole-dollar amounts; any other text is returned unchanged.
 */
export function formatPriceText(raw: string): string {
  const match = raw.trim().match(BARE_AMOUNT);
  if (!match) return raw;

  const digits = match[1].replace(/,/g, "").replace(/^0+(?=\d)/, "");
  return `$${digits.replace(/\B(?=(\d{3})+(?!\d))/g, ",")}`;
}

export function normalizePriceModifications(modifications: readonly Modification[]): Modification[] {
  return modifications.map((modification) => {
    if (modification.text === undefined || !PRICE_LAYER.test(modification.name)) {
      return modification;
    }
    return { ...modification, text: formatPriceText(modification.text) };
  });
}
