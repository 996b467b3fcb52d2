import { beforeEach, describe, it, expect, vi } from "vitest";
import { FunctionCallingConfigMode, GenerateContentResponse } from "@google/genai";
import {
  categorizeRequest,
  mapListingToTemplate,
  sanitizeModifications,
} from "~/services/design/listing-mapper.server";
import type { GeminiModels } from "~/utils/gemini-client.server";
import { JUST_LISTED, LISTING } from "../helpers/design-fixtures";

function functionCallResponse(name: string, args: Record<string, unknown>): GenerateContentResponse {
  const response = new GenerateContentResponse();
  response.candidates = [{ content: { role: "model", parts: [{ functionCall: { name, args } }] } }];
  return response;
}

function textResponse(text: string): GenerateContentResponse {
  const response = new GenerateContentResponse();
  response.candidates = [{ content: { role: "model", parts: [{ text }] } }];
  return response;
}

describe("listing-mapper", () => {
  const generateContent = vi.fn<GeminiModels["generateContent"]>();
  const models: GeminiModels = { generateContent };

  beforeEach(() => {
    generateContent.mockReset();
  });

  describe("categorizeRequest", () => {
    it("returns the category from the structured call", async () => {
      generateContent.mockResolvedValue(functionCallResponse("set_design_category", { category: "just_sold" }));

      await expect(categorizeRequest("we sold 12 Oak Lane", "req-1", { models })).resolves.toBe("just_sold");

      const params = generateContent.mock.calls[0][0];
      expect(params.config?.toolConfig?.functionCallingConfig?.mode).toBe(FunctionCallingConfigMode.ANY);
      expect(params.contents).toBe(
        'Analyze the user\'s design request and categorize it by calling `set_design_category`.\n\nUser request: "we sold 12 Oak Lane"'
      );
    });

    it("falls back to general_property_ad on an unknown category", async () => {
      generateContent.mockResolvedValue(functionCallResponse("set_design_category", { category: "mansion" }));
      await expect(categorizeRequest("x", "req-2", { models })).resolves.toBe("general_property_ad");
    });

    it("falls back to general_property_ad on a text reply", async () => {
      generateContent.mockResolvedValue(textResponse("just listed, I think"));
      await expect(categorizeRequest("x", "req-3", { models })).resolves.toBe("general_property_ad");
    });

    it("falls back to general_property_ad when the call throws", async () => {
      generateContent.mockRejectedValue(new Error("quota exceeded"));
      await expect(categorizeRequest("x", "req-4", { models })).resolves.toBe("general_property_ad");
    });
  });

  describe("mapListingToTemplate", () => {
    it("keeps only template layers, canonicalizes names and formats prices", async () => {
      generateContent.mockResolvedValue(
        functionCallResponse("create_modifications", {
          modifications: [
            { name: "ADDRESS", text: "123 Main St" },
            { name: "Price", text: "450000" },
            { name: "garage", text: "2 cars" },
            { name: "bedrooms", text: "" },
          ],
        })
      );

      const result = await mapListingToTemplate(LISTING, JUST_LISTED, "req-5", { models });

      expect(result).toEqual([
        { name: "address", text: "123 Main St" },
        { name: "price", text: "$450,000" },
      ]);
    });

    it("returns an empty list when nothing maps", async () => {
      generateContent.mockResolvedValue(functionCallResponse("create_modifications", { modifications: [] }));
      await expect(mapListingToTemplate(LISTING, JUST_LISTED, "req-6", { models })).resolves.toEqual([]);
    });

    it("returns null when the oracle answers with text", async () => {
      generateContent.mockResolvedValue(textResponse("Here are the modifications..."));
      await expect(mapListingToTemplate(LISTING, JUST_LISTED, "req-7", { models })).resolves.toBeNull();
    });

    it("returns null when the oracle calls a different function", async () => {
      generateContent.mockResolvedValue(functionCallResponse("set_design_category", { category: "other" }));
      await expect(mapListingToTemplate(LISTING, JUST_LISTED, "req-8", { models })).resolves.toBeNull();
    });
  });

  it("sanitizeModifications collapses duplicate layers, later value wins", () => {
    expect(
      sanitizeModifications(
        [
          { name: "address", text: "old" },
          { name: "photo", image_url: " https://cdn.example.test/a.png " },
          { name: "Address", text: "new" },
        ],
        JUST_LISTED
      )
    ).toEqual([
      { name: "address", text: "new" },
      { name: "photo", image_url: "https://cdn.example.test/a.png" },
    ]);
  });
});
