import { beforeEach, describe, it, expect, vi } from "vitest";
import { FunctionCallingConfigMode, GenerateContentResponse, type Part } from "@google/genai";
import {
  buildControllerInstruction,
  buildHistoryWindow,
  decideNextAction,
} from "~/services/design/design-oracle.server";
import type { GeminiModels } from "~/utils/gemini-client.server";
import type { ChatMessage, DecideInput } from "~/services/design/types";
import { CATALOG } from "../helpers/design-fixtures";

function response(parts: Part[]): GenerateContentResponse {
  const result = new GenerateContentResponse();
  result.candidates = [{ content: { role: "model", parts } }];
  return result;
}

function input(overrides: Partial<DecideInput> = {}): DecideInput {
  return {
    history: [],
    prompt: "make a just listed flyer",
    catalog: CATALOG,
    designContext: { template_uid: null, modifications: [] },
    requestId: "req-oracle",
    ...overrides,
  };
}

describe("design-oracle", () => {
  const generateContent = vi.fn<GeminiModels["generateContent"]>();
  const models: GeminiModels = { generateContent };

  beforeEach(() => {
    generateContent.mockReset();
  });

  describe("buildHistoryWindow", () => {
    it("drops rendered-image replies, keeps the last messages and maps roles", () => {
      const history: ChatMessage[] = [
        { role: "assistant", content: "Hello!" },
        { role: "user", content: "one" },
        { role: "assistant", content: "Here you go\n\n![Generated Image](https://images.example.test/a.png)" },
        { role: "user", content: "two" },
        { role: "assistant", content: "three" },
      ];

      expect(buildHistoryWindow(history, 3)).toEqual([
        { role: "user", parts: [{ text: "one" }] },
        { role: "user", parts: [{ text: "two" }] },
        { role: "model", parts: [{ text: "three" }] },
      ]);
    });
  });

  it("buildControllerInstruction embeds the catalog and the current design", () => {
    const instruction = buildControllerInstruction(CATALOG, { template_uid: "tpl-sold", modifications: [] });
    expect(instruction).toContain('"uid": "tpl-open"');
    expect(instruction).toContain('"template_uid": "tpl-sold"');
    expect(instruction).not.toContain("{{catalogJson}}");
  });

  it("returns the structured call", async () => {
    generateContent.mockResolvedValue(
      response([{ functionCall: { name: "process_user_request", args: { action: "GENERATE", response_text: "On it!" } } }])
    );

    const reply = await decideNextAction(
      input({ history: [{ role: "assistant", content: "Hello!" }] }),
      models
    );

    expect(reply).toEqual({
      kind: "call",
      name: "process_user_request",
      args: { action: "GENERATE", response_text: "On it!" },
    });

    const params = generateContent.mock.calls[0][0];
    expect(params.contents).toEqual([
      { role: "model", parts: [{ text: "Hello!" }] },
      { role: "user", parts: [{ text: "make a just listed flyer" }] },
    ]);
    expect(params.config?.toolConfig?.functionCallingConfig?.mode).toBe(FunctionCallingConfigMode.AUTO);
  });

  it("returns a plain text reply", async () => {
    generateContent.mockResolvedValue(response([{ text: "  Hi! What can I make for you?  " }]));
    await expect(decideNextAction(input(), models)).resolves.toEqual({
      kind: "text",
      text: "Hi! What can I make for you?",
    });
  });

  it("treats an empty reply as none", async () => {
    generateContent.mockResolvedValue(new GenerateContentResponse());
    await expect(decideNextAction(input(), models)).resolves.toEqual({ kind: "none", reason: "empty response" });
  });

  it("treats a failed call as none", async () => {
    generateContent.mockRejectedValue(new Error("network down"));
    await expect(decideNextAction(input(), models)).resolves.toEqual({ kind: "none", reason: "network down" });
  });
});
