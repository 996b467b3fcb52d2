/**
 * Render failures. RenderStartError: the job was never accepted.
 * RenderFailedError: it was accepted but never produced an image.
 */

export class RenderStartError extends Error {
  readonly templateUid: string;
  readonly status?: number;

  constructor(templateUid: string, message: string, opts?: { status?: number }) {
    super(message);
    this.name = "RenderStartError";
    this.templateUid = templateUid;
    this.status = opts?.status;
  }
}

export type RenderFailureReason = "failed" | "timeout" | "poll_error";

export class RenderFailedError extends Error {
  readonly renderUid: string;
  readonly reason: RenderFailureReason;
  readonly attempts: number;

  constructor(args: { renderUid: string; reason: RenderFailureReason; attempts: number; message: string }) {
    super(args.message);
    this.name = "RenderFailedError";
    this.renderUid = args.renderUid;
    this.reason = args.reason;
    this.attempts = args.attempts;
  }
}

export type RenderError = RenderStartError | RenderFailedError;
