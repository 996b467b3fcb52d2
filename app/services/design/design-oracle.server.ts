/**
 * Design oracle: one controller call per conversational turn.
 *
 * The model may either call `process_user_request` or answer in plain text;
 * anything else (another function, an empty reply, a timeout) is "none".
 */

import { FunctionCallingConfigMode, type Content } from "@google/genai";
import {
  getGeminiModels,
  readOracleReply,
  withTimeout,
  type GeminiModels,
} from "~/utils/gemini-client.server";
import { logger, createLogContext } from "~/utils/logger.server";
import {
  CONTROLLER_HISTORY_WINDOW,
  CONTROLLER_TIMEOUT_MS,
  DESIGN_ORACLE_MODEL,
} from "~/config/ai-models.config";
import {
  DESIGN_CONTROLLER_PROMPT,
  DESIGN_CONTROLLER_REFERENCE_TEMPLATE,
} from "~/config/prompts/design-controller.prompt";
import { renderPromptTemplate } from "~/config/prompts/render-prompt";
import { PROCESS_USER_REQUEST, PROCESS_USER_REQUEST_TOOL } from "~/config/schemas/design-tools.schema";
import type { ChatMessage, DecideInput, DesignContext, DesignOracle, OracleReply, Template } from "./types";

const GENERATED_IMAGE_MARKER = "![Generated Image]";

/**
 * Recent turns for the controller. Rendered-image replies are left out; the
 * URLs add nothing the model can use.
 */
export function buildHistoryWindow(
  history: readonly ChatMessage[],
  windowSize: number = CONTROLLER_HISTORY_WINDOW
): Content[] {
  return history
    .filter((message) => !(message.role === "assistant" && message.content.includes(GENERATED_IMAGE_MARKER)))
    .slice(-windowSize)
    .map((message) => ({
      role: message.role === "assistant" ? "model" : "user",
      parts: [{ text: message.content }],
    }));
}

export function buildControllerInstruction(catalog: readonly Template[], designContext: DesignContext): string {
  const reference = renderPromptTemplate(DESIGN_CONTROLLER_REFERENCE_TEMPLATE, {
    catalogJson: JSON.stringify(catalog, null, 2),
    designContextJson: JSON.stringify(designContext, null, 2),
  });
  return `${DESIGN_CONTROLLER_PROMPT}\n\n${reference}`;
}

export async function decideNextAction(input: DecideInput, models?: GeminiModels): Promise<OracleReply> {
  const logContext = createLogContext("chat", input.requestId, "oracle", {
    templateUid: input.designContext.template_uid ?? undefined,
  });
  const startTime = Date.now();

  try {
    const contents: Content[] = [
      ...buildHistoryWindow(input.history),
      { role: "user", parts: [{ text: input.prompt }] },
    ];

    const response = await withTimeout(
      (models ?? getGeminiModels()).generateContent({
        model: DESIGN_ORACLE_MODEL,
        contents,
        config: {
          systemInstruction: buildControllerInstruction(input.catalog, input.designContext),
          tools: [{ functionDeclarations: [PROCESS_USER_REQUEST_TOOL] }],
          toolConfig: {
            functionCallingConfig: { mode: FunctionCallingConfigMode.AUTO },
          },
        },
      }),
      CONTROLLER_TIMEOUT_MS
    );

    const reply = readOracleReply(response, PROCESS_USER_REQUEST);
    logger.info(
      { ...logContext, stage: "complete", kind: reply.kind, durationMs: Date.now() - startTime },
      reply.kind === "none" ? `Oracle returned nothing usable: ${reply.reason}` : `Oracle replied (${reply.kind})`
    );
    return reply;
  } catch (error) {
    logger.error({ ...logContext, durationMs: Date.now() - startTime }, "Oracle call failed", error);
    return { kind: "none", reason: error instanceof Error ? error.message : String(error) };
  }
}

export const geminiDesignOracle: DesignOracle = {
  decide: (input) => decideNextAction(input),
};
