import { json, type ActionFunctionArgs } from "@remix-run/node";
import { getDesignServices, handleTurn, prepareChat, sessionStore } from "~/services/design";
import { logger, createLogContext } from "~/utils/logger.server";
import { addRequestIdHeader, getRequestId } from "~/utils/request-context.server";
import { validateChatMessage, validateSessionId } from "~/utils/validation.server";

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return !!value && typeof value === "object" && !Array.isArray(value);
}

// POST /api/chat  { sessionId?, message } -> { sessionId, reply, mode, designContext }
export const action = async ({ request }: ActionFunctionArgs) => {
    const requestId = getRequestId(request);
    const logContext = createLogContext("chat", requestId, "action");

    if (request.method !== "POST") {
        return addRequestIdHeader(json({ error: "Method not allowed" }, { status: 405 }), requestId);
    }

    const readiness = await prepareChat(requestId);
    if (!readiness.ok) {
        return addRequestIdHeader(json({ error: readiness.message }, { status: 503 }), requestId);
    }

    let body: unknown;
    try {
        body = await request.json();
    } catch (error) {
        logger.warn({ ...logContext, stage: "parse" }, "Invalid JSON body", error);
        return addRequestIdHeader(json({ error: "Request body must be JSON" }, { status: 400 }), requestId);
    }
    if (!isPlainObject(body)) {
        return addRequestIdHeader(json({ error: "Request body must be a JSON object" }, { status: 400 }), requestId);
    }

    const message = validateChatMessage(body.message);
    if (!message.valid) {
        return addRequestIdHeader(json({ error: message.error }, { status: 400 }), requestId);
    }

    let sessionId: string | null = null;
    if (body.sessionId !== undefined && body.sessionId !== null) {
        const validated = validateSessionId(body.sessionId);
        if (!validated.valid) {
            return addRequestIdHeader(json({ error: validated.error }, { status: 400 }), requestId);
        }
        sessionId = validated.sanitized;
    }

    const session = sessionStore.getOrCreate(sessionId);
    const result = await handleTurn(session, message.sanitized, {
        services: getDesignServices(),
        catalog: readiness.catalog,
        requestId,
    });

    return addRequestIdHeader(
        json({
            sessionId: session.id,
            reply: result.reply,
            mode: result.mode,
            designContext: session.designContext,
        }),
        requestId
    );
};
