/**
 * Bannerbear REST client
 *
 * Template catalog (summary + detail) and image jobs (create + status).
 * Auth is a bearer token; every request has its own timeout.
 */

import { loadAppConfig } from "~/utils/env.server";
import type { Modification, Template, TemplateLayer } from "./design/types";

const DEFAULT_TIMEOUT_MS = 15_000;

export type BannerbearImageStatus = "pending" | "completed" | "failed" | string;

export interface BannerbearTemplateSummary {
  uid: string;
  name: string | null;
}

export interface BannerbearImage {
  uid: string;
  status: BannerbearImageStatus;
  imageUrl: string | null;
}

export class BannerbearRequestError extends Error {
  readonly path: string;
  readonly status?: number;

  constructor(message: string, opts: { path: string; status?: number }) {
    super(message);
    this.name = "BannerbearRequestError";
    this.path = opts.path;
    this.status = opts.status;
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function readString(value: unknown): string | null {
  return typeof value === "string" && value.trim() ? value : null;
}

function inferLayerType(entry: Record<string, unknown>): string {
  if (typeof entry.type === "string" && entry.type.trim()) {
    return entry.type.trim().toLowerCase();
  }
  if ("image_url" in entry) return "image";
  if ("text" in entry) return "text";
  return "unknown";
}

/**
 * Template detail -> Template. Layers come from `elements`; when a response
 * only has `available_modifications`, the layer type is inferred from its keys.
 * Returns null when there is no uid.
 */
export function normalizeTemplateDetail(body: unknown): Template | null {
  if (!isPlainObject(body)) return null;
  const uid = readString(body.uid);
  if (!uid) return null;

  const source = Array.isArray(body.elements)
    ? body.elements
    : Array.isArray(body.available_modifications)
      ? body.available_modifications
      : [];

  const layers: TemplateLayer[] = [];
  const seen = new Set<string>();
  for (const entry of source) {
    if (!isPlainObject(entry)) continue;
    const name = readString(entry.name);
    if (!name || seen.has(name.toLowerCase())) continue;
    seen.add(name.toLowerCase());
    layers.push({ name, type: inferLayerType(entry) });
  }

  return { uid, name: readString(body.name) ?? uid, layers };
}

export function normalizeImage(body: unknown): BannerbearImage | null {
  if (!isPlainObject(body)) return null;
  const uid = readString(body.uid);
  if (!uid) return null;
  return {
    uid,
    status: readString(body.status) ?? "pending",
    imageUrl: readString(body.image_url_png) ?? readString(body.image_url),
  };
}

export class BannerbearClient {
  constructor(
    private readonly apiKey: string,
    private readonly baseUrl: string = "https://api.bannerbear.com/v2",
    private readonly timeoutMs: number = DEFAULT_TIMEOUT_MS
  ) {}

  /**
   * Client from environment, or null when BANNERBEAR_API_KEY is not set
   */
  static fromEnv(): BannerbearClient | null {
    const config = loadAppConfig();
    if (!config.bannerbearApiKey) return null;
    return new BannerbearClient(config.bannerbearApiKey, config.bannerbearApiUrl);
  }

  async listTemplates(): Promise<BannerbearTemplateSummary[]> {
    const body = await this.request("/templates", { method: "GET" });
    if (!Array.isArray(body)) {
      throw new BannerbearRequestError("Template summary is not an array", { path: "/templates" });
    }
    const summaries: BannerbearTemplateSummary[] = [];
    for (const entry of body) {
      if (!isPlainObject(entry)) continue;
      const uid = readString(entry.uid);
      if (uid) summaries.push({ uid, name: readString(entry.name) });
    }
    return summaries;
  }

  async getTemplate(uid: string): Promise<Template> {
    const path = `/templates/${encodeURIComponent(uid)}`;
    const template = normalizeTemplateDetail(await this.request(path, { method: "GET" }));
    if (!template) {
      throw new BannerbearRequestError("Template detail is malformed", { path });
    }
    return template;
  }

  async createImage(templateUid: string, modifications: Modification[]): Promise<BannerbearImage> {
    const body = await this.request("/images", {
      method: "POST",
      body: JSON.stringify({ template: templateUid, modifications }),
    });
    const image = normalizeImage(body);
    if (!image) {
      throw new BannerbearRequestError("Image creation response has no uid", { path: "/images" });
    }
    return image;
  }

  async getImage(uid: string): Promise<BannerbearImage> {
    const path = `/images/${encodeURIComponent(uid)}`;
    const image = normalizeImage(await this.request(path, { method: "GET" }));
    if (!image) {
      throw new BannerbearRequestError("Image status response has no uid", { path });
    }
    return image;
  }

  private async request(path: string, init: { method: "GET" | "POST"; body?: string }): Promise<unknown> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const resp = await fetch(`${this.baseUrl}${path}`, {
        method: init.method,
        body: init.body,
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          "Content-Type": "application/json",
          Accept: "application/json",
        },
        signal: controller.signal,
      });

      if (!resp.ok) {
        const text = await resp.text().catch(() => "");
        throw new BannerbearRequestError(
          `Bannerbear request failed (HTTP ${resp.status}): ${text.slice(0, 200)}`,
          { path, status: resp.status }
        );
      }

      return await resp.json();
    } catch (error) {
      if (error instanceof BannerbearRequestError) throw error;
      if (error instanceof Error && error.name === "AbortError") {
        throw new BannerbearRequestError(`Bannerbear request timed out after ${this.timeoutMs}ms`, { path });
      }
      throw new BannerbearRequestError(
        `Bannerbear request failed: ${error instanceof Error ? error.message : String(error)}`,
        { path }
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
