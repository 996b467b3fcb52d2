import type { Storage } from "@google-cloud/storage";
import { getGcsBucketName, getGcsClient } from "~/utils/gcs-client.server";
import { logger, type LogContext } from "~/utils/logger.server";

export const SIGNED_URL_TTL_MS = 24 * 60 * 60 * 1000;

export class StorageNotConfiguredError extends Error {
    constructor() {
        super("GCS_BUCKET is not set");
        this.name = "StorageNotConfiguredError";
    }
}

export interface StorageTarget {
    storage?: Storage;
    bucketName?: string | null;
}

/**
 * Save `buffer` under `key` and return a v4 signed read URL.
 */
export async function uploadToGcs(
    key: string,
    buffer: Buffer,
    contentType: string,
    logContext: LogContext,
    target: StorageTarget = {}
): Promise<string> {
    const bucketName = target.bucketName === undefined ? getGcsBucketName() : target.bucketName;
    if (!bucketName) {
        throw new StorageNotConfiguredError();
    }

    logger.info(
        { ...logContext, stage: "gcs-save" },
        `Uploading to GCS bucket ${bucketName}, key: ${key}, size: ${buffer.length} bytes`
    );

    const file = (target.storage ?? getGcsClient()).bucket(bucketName).file(key);

    try {
        await file.save(buffer, { contentType, resumable: false });

        const [signedUrl] = await file.getSignedUrl({
            version: "v4",
            action: "read",
            expires: Date.now() + SIGNED_URL_TTL_MS,
        });

        logger.info(
            { ...logContext, stage: "gcs-signed" },
            `Upload successful, signed URL generated: ${signedUrl.substring(0, 80)}...`
        );
        return signedUrl;
    } catch (error) {
        logger.error(
            { ...logContext, stage: "gcs-save" },
            `Failed to upload to GCS bucket ${bucketName}, key: ${key}`,
            error
        );
        throw error;
    }
}
