/**
 * Input Validation Utilities
 *
 * Validation for chat route inputs.
 */

export const MAX_MESSAGE_LENGTH = 4000;
export const MAX_UPLOAD_BYTES = 10 * 1024 * 1024;
export const ALLOWED_UPLOAD_TYPES = ["image/png", "image/jpeg", "image/webp"] as const;

export type ValidationResult<T> =
    | { valid: true; sanitized: T }
    | { valid: false; error: string };

/**
 * Validates a session id (UUID or similar token)
 */
export function validateSessionId(sessionId: unknown): ValidationResult<string> {
    if (typeof sessionId !== 'string') {
        return { valid: false, error: 'Session ID must be a string' };
    }

    const trimmed = sessionId.trim();
    if (trimmed.length < 10 || trimmed.length > 50) {
        return { valid: false, error: 'Session ID has invalid length' };
    }

    if (!/^[a-zA-Z0-9_-]+$/.test(trimmed)) {
        return { valid: false, error: 'Session ID contains invalid characters' };
    }

    return { valid: true, sanitized: trimmed };
}

/**
 * Validates a chat message body
 */
export function validateChatMessage(message: unknown): ValidationResult<string> {
    if (typeof message !== 'string') {
        return { valid: false, error: 'Message must be a string' };
    }

    const trimmed = message.trim();
    if (trimmed.length === 0) {
        return { valid: false, error: 'Message cannot be empty' };
    }
    if (trimmed.length > MAX_MESSAGE_LENGTH) {
        return { valid: false, error: `Message exceeds ${MAX_MESSAGE_LENGTH} characters` };
    }

    return { valid: true, sanitized: trimmed };
}

/**
 * Validates the content type of an uploaded image
 */
export function validateContentType(contentType: unknown): ValidationResult<string> {
    if (typeof contentType !== 'string') {
        return { valid: false, error: 'Content type must be a string' };
    }

    const normalized = contentType.toLowerCase().trim() === 'image/jpg'
        ? 'image/jpeg'
        : contentType.toLowerCase().trim();

    const allowed: readonly string[] = ALLOWED_UPLOAD_TYPES;
    if (!allowed.includes(normalized)) {
        return { valid: false, error: `Invalid content type. Allowed: ${ALLOWED_UPLOAD_TYPES.join(', ')}` };
    }

    return { valid: true, sanitized: normalized };
}
