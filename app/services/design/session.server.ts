/**
 * Conversation sessions (in-memory, per process)
 */

import { randomUUID } from "node:crypto";
import { logger, createLogContext } from "~/utils/logger.server";
import { cloneDesignContext, createDesignContext } from "./design-context.server";
import type { ChatMessage, ChatRole, DesignContext, SessionMode, StagedImage } from "./types";

export const GREETING =
  "Hello! I'm your design assistant. What would you like to create today? For example, you can say 'make a just listed flyer for 123 Main St'.";

export interface SessionSnapshot {
  sessionId: string;
  mode: SessionMode;
  messages: ChatMessage[];
  designContext: DesignContext;
  hasStagedImage: boolean;
}

export class DesignSession {
  readonly id: string;
  readonly messages: ChatMessage[] = [];
  designContext: DesignContext = createDesignContext();
  lastActiveAt: number;

  private currentMode: SessionMode = "IDLE";
  private pendingRequest: string | null = null;
  private stagedImage: StagedImage | null = null;
  private queue: Promise<void> = Promise.resolve();

  constructor(id: string = randomUUID(), now: number = Date.now()) {
    this.id = id;
    this.lastActiveAt = now;
    this.messages.push({ role: "assistant", content: GREETING });
  }

  get mode(): SessionMode {
    return this.currentMode;
  }

  /** The user request that led to the MLS ID question, while awaiting it */
  get awaitingRequest(): string | null {
    return this.pendingRequest;
  }

  appendMessage(role: ChatRole, content: string): void {
    this.messages.push({ role, content });
  }

  enterIdentifierMode(request: string): void {
    this.currentMode = "AWAITING_IDENTIFIER";
    this.pendingRequest = request;
  }

  leaveIdentifierMode(): void {
    this.currentMode = "IDLE";
    this.pendingRequest = null;
  }

  stageImage(image: StagedImage): void {
    this.stagedImage = image;
  }

  get hasStagedImage(): boolean {
    return this.stagedImage !== null;
  }

  /** Removes and returns the staged image; it is used by one turn only. */
  takeStagedImage(): StagedImage | null {
    const image = this.stagedImage;
    this.stagedImage = null;
    return image;
  }

  /**
   * Run `task` after every earlier task on this session has settled.
   * A failed task does not block the ones queued behind it.
   */
  runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const result = this.queue.then(task);
    this.queue = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  touch(now: number = Date.now()): void {
    this.lastActiveAt = now;
  }

  snapshot(): SessionSnapshot {
    return {
      sessionId: this.id,
      mode: this.currentMode,
      messages: this.messages.map((message) => ({ ...message })),
      designContext: cloneDesignContext(this.designContext),
      hasStagedImage: this.hasStagedImage,
    };
  }
}

export class SessionStore {
  private readonly sessions = new Map<string, DesignSession>();

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now
  ) {}

  get size(): number {
    return this.sessions.size;
  }

  get(id: string): DesignSession | null {
    this.prune();
    const session = this.sessions.get(id);
    if (!session) return null;
    session.touch(this.now());
    return session;
  }

  /** Sessions are always created under a server-minted id; an unknown `id` is ignored. */
  getOrCreate(id?: string | null): DesignSession {
    const existing = id ? this.get(id) : null;
    if (existing) return existing;

    const session = new DesignSession(randomUUID(), this.now());
    this.sessions.set(session.id, session);
    logger.info(createLogContext("chat", "session", "created", { sessionId: session.id }), "Session created");
    return session;
  }

  prune(): number {
    const cutoff = this.now() - this.ttlMs;
    let removed = 0;
    for (const [id, session] of this.sessions) {
      if (session.lastActiveAt < cutoff) {
        this.sessions.delete(id);
        removed++;
      }
    }
    if (removed > 0) {
      logger.info(createLogContext("chat", "session", "pruned", { removed }), `Pruned ${removed} idle session(s)`);
    }
    return removed;
  }
}
