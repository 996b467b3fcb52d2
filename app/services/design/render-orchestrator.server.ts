/**
 * Render Orchestrator
 *
 * Submits template + modifications and polls the job until it completes,
 * fails, or the attempt budget runs out. Never throws; every outcome is a
 * RenderResult.
 */

import { BannerbearClient, BannerbearRequestError, type BannerbearImage } from "../bannerbear.server";
import { loadAppConfig } from "~/utils/env.server";
import { logger, createLogContext } from "~/utils/logger.server";
import { RenderFailedError, RenderStartError } from "./errors";
import type { Modification, RenderResult } from "./types";

export interface RenderClient {
  createImage(templateUid: string, modifications: Modification[]): Promise<BannerbearImage>;
  getImage(uid: string): Promise<BannerbearImage>;
}

export interface RenderOptions {
  client?: RenderClient | null;
  maxAttempts?: number;
  intervalMs?: number;
  maxIntervalMs?: number;
  sleep?: (ms: number) => Promise<void>;
  requestId?: string;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * interval, interval*1.5, interval*2.25 ... capped at maxIntervalMs
 */
export function pollDelayMs(attempt: number, intervalMs: number, maxIntervalMs: number): number {
  return Math.min(Math.round(intervalMs * Math.pow(1.5, Math.max(0, attempt))), maxIntervalMs);
}

export async function renderDesign(
  templateUid: string,
  modifications: Modification[],
  options: RenderOptions = {}
): Promise<RenderResult> {
  const config = loadAppConfig();
  const maxAttempts = options.maxAttempts ?? config.renderPoll.maxAttempts;
  const intervalMs = options.intervalMs ?? config.renderPoll.intervalMs;
  const maxIntervalMs = options.maxIntervalMs ?? config.renderPoll.maxIntervalMs;
  const wait = options.sleep ?? sleep;
  const client = options.client === undefined ? BannerbearClient.fromEnv() : options.client;

  const logContext = createLogContext("render", options.requestId ?? "render", "start", {
    templateUid,
    modificationCount: modifications.length,
  });

  if (!client) {
    logger.error(logContext, "BANNERBEAR_API_KEY not set; cannot start render");
    return { ok: false, error: new RenderStartError(templateUid, "Rendering service is not configured") };
  }

  let job: BannerbearImage;
  try {
    job = await client.createImage(templateUid, modifications);
  } catch (error) {
    logger.error({ ...logContext, stage: "start-failed" }, "Render submission rejected", error);
    const status = error instanceof BannerbearRequestError ? error.status : undefined;
    return {
      ok: false,
      error: new RenderStartError(
        templateUid,
        error instanceof Error ? error.message : "Render submission rejected",
        { status }
      ),
    };
  }

  logger.info({ ...logContext, stage: "submitted", renderUid: job.uid }, "Render job submitted");

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    if (job.status === "completed" && job.imageUrl) {
      logger.info({ ...logContext, stage: "complete", renderUid: job.uid, attempt }, "Render completed");
      return { ok: true, imageUrl: job.imageUrl, renderUid: job.uid };
    }
    if (job.status === "failed") {
      logger.error({ ...logContext, stage: "render-failed", renderUid: job.uid, attempt }, "Render job failed");
      return {
        ok: false,
        error: new RenderFailedError({
          renderUid: job.uid,
          reason: "failed",
          attempts: attempt,
          message: "Rendering service reported a failed job",
        }),
      };
    }

    await wait(pollDelayMs(attempt, intervalMs, maxIntervalMs));

    try {
      job = await client.getImage(job.uid);
    } catch (error) {
      logger.error({ ...logContext, stage: "poll-error", renderUid: job.uid, attempt }, "Render status poll failed", error);
      return {
        ok: false,
        error: new RenderFailedError({
          renderUid: job.uid,
          reason: "poll_error",
          attempts: attempt + 1,
          message: error instanceof Error ? error.message : "Render status poll failed",
        }),
      };
    }
  }

  if (job.status === "completed" && job.imageUrl) {
    logger.info({ ...logContext, stage: "complete", renderUid: job.uid, attempt: maxAttempts }, "Render completed");
    return { ok: true, imageUrl: job.imageUrl, renderUid: job.uid };
  }

  logger.error({ ...logContext, stage: "timeout", renderUid: job.uid, maxAttempts }, "Render polling exhausted");
  return {
    ok: false,
    error: new RenderFailedError({
      renderUid: job.uid,
      reason: job.status === "failed" ? "failed" : "timeout",
      attempts: maxAttempts,
      message: `Render did not complete after ${maxAttempts} polls`,
    }),
  };
}
