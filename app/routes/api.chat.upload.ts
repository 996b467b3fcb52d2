import { json, type ActionFunctionArgs } from "@remix-run/node";
import { sessionStore } from "~/services/design";
import { logger, createLogContext } from "~/utils/logger.server";
import { addRequestIdHeader, getRequestId } from "~/utils/request-context.server";
import {
    ALLOWED_UPLOAD_TYPES,
    MAX_UPLOAD_BYTES,
    validateContentType,
    validateSessionId,
} from "~/utils/validation.server";

// POST /api/chat/upload  multipart: sessionId, image
// The image is held on the session and hosted with the next message.
export const action = async ({ request }: ActionFunctionArgs) => {
    const requestId = getRequestId(request);
    const logContext = createLogContext("upload", requestId, "stage");

    if (request.method !== "POST") {
        return addRequestIdHeader(json({ error: "Method not allowed" }, { status: 405 }), requestId);
    }

    let form: FormData;
    try {
        form = await request.formData();
    } catch (error) {
        logger.warn({ ...logContext, stage: "parse" }, "Invalid multipart body", error);
        return addRequestIdHeader(json({ error: "Expected multipart form data" }, { status: 400 }), requestId);
    }

    const sessionId = validateSessionId(form.get("sessionId"));
    if (!sessionId.valid) {
        return addRequestIdHeader(json({ error: sessionId.error }, { status: 400 }), requestId);
    }

    const session = sessionStore.get(sessionId.sanitized);
    if (!session) {
        return addRequestIdHeader(json({ error: "Session not found" }, { status: 404 }), requestId);
    }

    const image = form.get("image");
    if (image === null || typeof image === "string") {
        return addRequestIdHeader(json({ error: "Missing image file" }, { status: 400 }), requestId);
    }

    const contentType = validateContentType(image.type);
    if (!contentType.valid) {
        return addRequestIdHeader(
            json({ error: contentType.error, allowed_types: ALLOWED_UPLOAD_TYPES }, { status: 400 }),
            requestId
        );
    }
    if (image.size === 0 || image.size > MAX_UPLOAD_BYTES) {
        return addRequestIdHeader(
            json({ error: `Image must be between 1 byte and ${MAX_UPLOAD_BYTES} bytes` }, { status: 400 }),
            requestId
        );
    }

    session.stageImage({
        bytes: Buffer.from(await image.arrayBuffer()),
        contentType: contentType.sanitized,
        filename: image.name,
    });
    logger.info(
        { ...logContext, sessionId: session.id, bytes: image.size, contentType: contentType.sanitized },
        "Image staged for next message"
    );

    return addRequestIdHeader(json({ sessionId: session.id, staged: true }), requestId);
};
