/**
 * One conversational turn, end to end.
 *
 * Turns on a session run one at a time (DesignSession.runExclusive). While the
 * session awaits an MLS ID the oracle is bypassed and the message goes to the
 * listing pipeline instead; a staged image waits for the next oracle turn.
 */

import { logger, createLogContext } from "~/utils/logger.server";
import { validateDecision } from "./decision-validator.server";
import { applyDecision, generateAndDescribe } from "./decision-router.server";
import {
  IDENTIFIER_REPROMPT,
  NO_IDENTIFIER_FOLLOW_UP,
  extractListingIdentifier,
  isIdentifierCancel,
  listingNotFoundReply,
  requestsListingIdentifier,
} from "./identifier.server";
import type { DesignSession } from "./session.server";
import { planDesignFromListing } from "./template-selector.server";
import type { DesignServices, OracleReply, SessionMode, Template } from "./types";

export const CONNECTION_TROUBLE_REPLY = "I'm having trouble connecting right now. Please try again in a moment.";

export const GENERIC_ERROR_REPLY = "I'm sorry, something went wrong. Could you please try rephrasing?";

export const UPLOAD_FAILED_NOTE = "(I couldn't upload your image, so I'll continue without it.)";

export const NO_MAPPING_REPLY =
  "I found the property, but I couldn't build a design from its details. Could you tell me what you'd like on the flyer?";

export interface TurnOptions {
  services: DesignServices;
  catalog: Template[];
  requestId: string;
}

export interface TurnResult {
  reply: string;
  mode: SessionMode;
}

export function withImageContext(message: string, imageUrl: string): string {
  return `Image context: the user uploaded an image available at ${imageUrl}\n\n${message}`;
}

export function handleTurn(session: DesignSession, message: string, options: TurnOptions): Promise<TurnResult> {
  return session.runExclusive(() => runTurn(session, message, options));
}

async function runTurn(session: DesignSession, message: string, options: TurnOptions): Promise<TurnResult> {
  const { requestId } = options;
  const logContext = createLogContext("chat", requestId, "turn", { sessionId: session.id, mode: session.mode });
  const startTime = Date.now();

  let reply: string;
  try {
    if (session.mode === "AWAITING_IDENTIFIER") {
      // A staged image stays staged until a message reaches the oracle.
      session.appendMessage("user", message);
      reply = await identifierTurn(session, message, options);
    } else {
      const staged = session.takeStagedImage();
      const imageUrl = staged ? await options.services.uploadImage(staged, session.id, requestId) : null;
      const uploadNote = staged && !imageUrl ? `${UPLOAD_FAILED_NOTE}\n\n` : "";

      session.appendMessage("user", message);
      reply = uploadNote + (await oracleTurn(session, message, imageUrl, options));
    }
  } catch (error) {
    logger.error(logContext, "Turn failed", error);
    reply = GENERIC_ERROR_REPLY;
  }

  session.appendMessage("assistant", reply);
  session.touch();
  logger.info(
    { ...logContext, stage: "complete", mode: session.mode, durationMs: Date.now() - startTime },
    "Turn complete"
  );
  return { reply, mode: session.mode };
}

async function oracleTurn(
  session: DesignSession,
  message: string,
  imageUrl: string | null,
  options: TurnOptions
): Promise<string> {
  const { services, requestId } = options;
  const logContext = createLogContext("chat", requestId, "decide", { sessionId: session.id });

  const oracleReply = await services.oracle.decide({
    history: session.messages.slice(0, -1),
    prompt: imageUrl ? withImageContext(message, imageUrl) : message,
    catalog: options.catalog,
    designContext: session.designContext,
    requestId,
  });

  const reply = await replyFromOracle(session, message, oracleReply, options);

  if (requestsListingIdentifier(reply)) {
    session.enterIdentifierMode(message);
    logger.info({ ...logContext, stage: "await-identifier" }, "Waiting for MLS ID");
  }
  return reply;
}

async function replyFromOracle(
  session: DesignSession,
  message: string,
  oracleReply: OracleReply,
  options: TurnOptions
): Promise<string> {
  const { services, requestId } = options;
  const logContext = createLogContext("chat", requestId, "decide", { sessionId: session.id });

  switch (oracleReply.kind) {
    case "call": {
      const validation = validateDecision(oracleReply.args);
      if (!validation.ok) {
        logger.warn({ ...logContext, stage: "invalid", issues: validation.issues }, "Oracle decision rejected");
        return validation.fallbackText ?? CONNECTION_TROUBLE_REPLY;
      }
      if (validation.issues.length > 0) {
        logger.warn({ ...logContext, issues: validation.issues }, "Dropped malformed modifications");
      }
      return applyDecision(session, validation.decision, message, services, requestId);
    }
    case "text":
      return oracleReply.text;
    case "none":
      return CONNECTION_TROUBLE_REPLY;
  }
}

async function identifierTurn(session: DesignSession, message: string, options: TurnOptions): Promise<string> {
  const { services, requestId } = options;
  const logContext = createLogContext("listing", requestId, "identifier", { sessionId: session.id });

  if (isIdentifierCancel(message)) {
    session.leaveIdentifierMode();
    logger.info({ ...logContext, stage: "cancelled" }, "MLS ID collection cancelled");
    return NO_IDENTIFIER_FOLLOW_UP;
  }

  const identifier = extractListingIdentifier(message);
  if (!identifier) {
    return IDENTIFIER_REPROMPT;
  }

  const listing = await services.fetchListing(identifier, requestId);
  if (!listing) {
    return listingNotFoundReply(identifier);
  }

  const request = session.awaitingRequest ?? message;
  session.leaveIdentifierMode();

  const plan = await planDesignFromListing(listing, request, options.catalog, services.mapper, requestId);
  if (!plan.ok) {
    return NO_MAPPING_REPLY;
  }

  session.designContext = { template_uid: plan.template.uid, modifications: plan.modifications };

  if (plan.missingFields.length > 0) {
    return `I've started a "${plan.template.name}" design with the details from MLS ${identifier}. I still need: ${plan.missingFields.join(", ")}. What should they say?`;
  }
  return generateAndDescribe(
    session,
    `Here's your "${plan.template.name}" design for MLS ${identifier}.`,
    services,
    requestId
  );
}
