import { Storage } from "@google-cloud/storage";
import { readEnv } from "./env.server";
import { logger, createLogContext } from "./logger.server";

let storageInstance: Storage | null = null;

type ServiceAccountCredentials = {
    client_email?: string;
    private_key?: string;
    project_id?: string;
};

function isCredentialObject(value: unknown): value is ServiceAccountCredentials {
    return !!value && typeof value === "object" && !Array.isArray(value);
}

function parseCredentials(raw: string): ServiceAccountCredentials {
    let jsonString = raw.trim();

    // Remove surrounding quotes if present
    if (jsonString.startsWith('"') && jsonString.endsWith('"')) {
        jsonString = jsonString.slice(1, -1);
    }

    // Accept base64 or plain JSON
    const decoded = Buffer.from(jsonString, "base64").toString("utf-8");
    const parsed: unknown = JSON.parse(decoded.startsWith("{") ? decoded : jsonString);
    if (!isCredentialObject(parsed)) {
        throw new Error("GOOGLE_CREDENTIALS_JSON is not a JSON object");
    }
    return parsed;
}

export function getGcsClient(): Storage {
    if (storageInstance) {
        return storageInstance;
    }

    const rawCredentials = readEnv("GOOGLE_CREDENTIALS_JSON");
    if (rawCredentials) {
        try {
            storageInstance = new Storage({ credentials: parseCredentials(rawCredentials) });
        } catch (error) {
            logger.error(
                createLogContext("system", "init", "gcs-credentials"),
                "Failed to parse GCS credentials, falling back to default credentials",
                error
            );
            storageInstance = new Storage();
        }
    } else {
        storageInstance = new Storage();
    }

    return storageInstance;
}

/**
 * Bucket for chat uploads, or null when uploads are not configured
 */
export function getGcsBucketName(): string | null {
    return readEnv("GCS_BUCKET") ?? null;
}
