/**
 * Hosting for images the user attaches in chat.
 *
 * Bytes are checked against their declared type, re-encoded as PNG and put
 * behind a signed URL the rendering service can fetch. Any failure yields
 * null; the turn then continues without the image.
 */

import { randomUUID } from "node:crypto";
import sharp from "sharp";
import { createLogContext, logger } from "~/utils/logger.server";
import { uploadToGcs, type StorageTarget } from "./storage.server";
import type { StagedImage } from "./design/types";

export class ImageValidationError extends Error {
    readonly contentType: string;

    constructor(contentType: string, message: string) {
        super(message);
        this.name = "ImageValidationError";
        this.contentType = contentType;
    }
}

export function validateMagicBytes(buffer: Buffer, mimeType: string): void {
    if (buffer.length < 3) {
        throw new ImageValidationError(mimeType, `Magic bytes mismatch: buffer too small for ${mimeType}`);
    }

    if (mimeType === "image/png") {
        // 89 50 4E 47 0D 0A 1A 0A
        const header = buffer.subarray(0, 8).toString("hex").toUpperCase();
        if (header !== "89504E470D0A1A0A") {
            throw new ImageValidationError(mimeType, `Magic bytes mismatch: expected PNG header, got ${header}`);
        }
        return;
    }

    if (mimeType === "image/jpeg") {
        const header = buffer.subarray(0, 3).toString("hex").toUpperCase();
        if (header !== "FFD8FF") {
            throw new ImageValidationError(mimeType, `Magic bytes mismatch: expected JPEG header, got ${header}`);
        }
        return;
    }

    if (mimeType === "image/webp") {
        if (buffer.length < 12) {
            throw new ImageValidationError(mimeType, `Magic bytes mismatch: buffer too small for WEBP (${buffer.length} bytes)`);
        }
        const riff = buffer.subarray(0, 4).toString("ascii");
        const webp = buffer.subarray(8, 12).toString("ascii");
        if (riff !== "RIFF" || webp !== "WEBP") {
            const header = buffer.subarray(0, 12).toString("hex").toUpperCase();
            throw new ImageValidationError(mimeType, `Magic bytes mismatch: expected WEBP (RIFF....WEBP), got ${header}`);
        }
        return;
    }

    throw new ImageValidationError(mimeType, `Unsupported image type: ${mimeType}`);
}

export function chatUploadKey(sessionId: string, id: string = randomUUID()): string {
    return `chat-uploads/${sessionId}/${id}.png`;
}

export async function uploadChatImage(
    image: StagedImage,
    sessionId: string,
    requestId: string,
    target: StorageTarget = {}
): Promise<string | null> {
    const logContext = createLogContext("upload", requestId, "start", {
        sessionId,
        contentType: image.contentType,
        bytes: image.bytes.length,
    });
    const startTime = Date.now();

    try {
        validateMagicBytes(image.bytes, image.contentType);

        const png = await sharp(image.bytes).png().toBuffer();
        const url = await uploadToGcs(chatUploadKey(sessionId), png, "image/png", logContext, target);

        logger.info(
            { ...logContext, stage: "complete", durationMs: Date.now() - startTime },
            "Chat image hosted"
        );
        return url;
    } catch (error) {
        logger.error({ ...logContext, stage: "failed" }, "Chat image upload failed", error);
        return null;
    }
}
