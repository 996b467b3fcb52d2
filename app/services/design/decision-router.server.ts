/**
 * Decision Router
 *
 * The only place an oracle decision changes the design context.
 *
 *   CONVERSE  -> reply, no change
 *   MODIFY    -> upsert; render only when a set template_uid is replaced
 *   GENERATE  -> render the current design
 *   RESET     -> clear the design, unless the user's message looks like noise
 */

import { logger, createLogContext } from "~/utils/logger.server";
import { applyModifications, hasTemplate, resetDesignContext } from "./design-context.server";
import type { DesignSession } from "./session.server";
import { isLikelyNoise } from "./noise-guard.server";
import { normalizePriceModifications } from "./price-format.server";
import { RenderStartError, type RenderError } from "./errors";
import type { DesignDecision, DesignServices, RenderResult } from "./types";

export const NO_TEMPLATE_REPLY = "I can't generate an image yet. Please describe the design you want first.";

export const NOISE_RESET_REPLY =
  "I'm not sure I understood that. Did you want to start a new design, or keep working on the current one?";

/**
 * User-facing line for a render failure. Provider details stay in the log.
 */
export function renderErrorReply(error: RenderError): string {
  if (error instanceof RenderStartError) {
    return "Sorry, I couldn't generate the image: the design service didn't accept the request. Please try again.";
  }
  switch (error.reason) {
    case "timeout":
      return "Sorry, I couldn't generate the image: it took too long to render. Please try again.";
    case "failed":
      return "Sorry, I couldn't generate the image: the design service reported an error. Please try again.";
    case "poll_error":
      return "Sorry, I couldn't generate the image: I lost contact with the design service. Please try again.";
  }
}

export function describeRenderResult(responseText: string, result: RenderResult): string {
  if (result.ok) {
    return `${responseText}\n\n![Generated Image](${result.imageUrl})`;
  }
  return `${responseText}\n\n${renderErrorReply(result.error)}`;
}

/**
 * Render the session's current design and fold the outcome into the reply.
 */
export async function generateAndDescribe(
  session: DesignSession,
  responseText: string,
  services: Pick<DesignServices, "render">,
  requestId: string
): Promise<string> {
  const context = session.designContext;
  if (!hasTemplate(context)) {
    return NO_TEMPLATE_REPLY;
  }
  const result = await services.render(context.template_uid, context.modifications, requestId);
  if (!result.ok) {
    logger.warn(
      createLogContext("render", requestId, "describe", { sessionId: session.id, templateUid: context.template_uid }),
      "Render failed",
      result.error
    );
  }
  return describeRenderResult(responseText, result);
}

export async function applyDecision(
  session: DesignSession,
  decision: DesignDecision,
  userMessage: string,
  services: Pick<DesignServices, "render">,
  requestId: string
): Promise<string> {
  const logContext = createLogContext("chat", requestId, "route", {
    sessionId: session.id,
    action: decision.action,
  });

  switch (decision.action) {
    case "CONVERSE":
      return decision.response_text;

    case "MODIFY": {
      const previousUid = session.designContext.template_uid;
      const templateChanged =
        previousUid !== null && decision.template_uid !== null && decision.template_uid !== previousUid;

      session.designContext = applyModifications(
        session.designContext,
        decision.template_uid,
        normalizePriceModifications(decision.modifications)
      );
      logger.info(
        {
          ...logContext,
          templateUid: session.designContext.template_uid ?? undefined,
          templateChanged,
          modificationCount: decision.modifications.length,
        },
        "Design updated"
      );

      if (!templateChanged) {
        return decision.response_text;
      }
      return generateAndDescribe(session, decision.response_text, services, requestId);
    }

    case "GENERATE":
      return generateAndDescribe(session, decision.response_text, services, requestId);

    case "RESET":
      if (isLikelyNoise(userMessage)) {
        logger.warn({ ...logContext, stage: "noise-guard" }, "Ignoring RESET triggered by noise input");
        return NOISE_RESET_REPLY;
      }
      session.designContext = resetDesignContext();
      logger.info(logContext, "Design reset");
      return decision.response_text;
  }
}
