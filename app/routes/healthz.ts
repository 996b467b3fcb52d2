/**
 * Health check endpoint
 *
 * Checks:
 * - Core configuration (GEMINI_API_KEY, BANNERBEAR_API_KEY)
 * - Template catalog (loaded once, cached afterwards)
 * - GCS bucket configured (uploads only; non-critical)
 * - Listings service configured (non-critical)
 *
 * Returns 200 if healthy, 503 if unhealthy
 */
import { json } from "@remix-run/node";
import { CORE_ENV_KEYS, loadAppConfig, readEnv } from "~/utils/env.server";
import { loadCatalog } from "~/services/design";

type CheckStatus = "ok" | "error" | "warning";

export const loader = async () => {
    const checks: Record<string, { status: CheckStatus; message?: string }> = {};
    let overallHealthy = true;
    const config = loadAppConfig();

    const missing = CORE_ENV_KEYS.filter((key) => !readEnv(key));
    if (missing.length > 0) {
        checks.config = { status: "error", message: `Missing: ${missing.join(", ")}` };
        overallHealthy = false;
    } else {
        checks.config = { status: "ok" };
    }

    if (overallHealthy) {
        const catalog = await loadCatalog({ requestId: "healthz" });
        if (catalog) {
            checks.catalog = { status: "ok", message: `${catalog.length} template(s)` };
        } else {
            checks.catalog = { status: "error", message: "Templates could not be loaded" };
            overallHealthy = false;
        }
    }

    checks.storage = config.gcsBucket
        ? { status: "ok" }
        : { status: "warning", message: "GCS_BUCKET not configured; image uploads disabled" };

    checks.listings =
        config.resoEndpoint && config.resoApiKey
            ? { status: "ok" }
            : { status: "warning", message: "RESO_API_ENDPOINT / RESO_API_KEY not configured; MLS lookup disabled" };

    const status = overallHealthy ? 200 : 503;
    return json(
        {
            status: overallHealthy ? "healthy" : "unhealthy",
            checks,
            timestamp: new Date().toISOString(),
        },
        { status }
    );
};
