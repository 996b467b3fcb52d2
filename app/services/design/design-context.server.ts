/**
 * Design Context Store
 *
 * Pure helpers over DesignContext. Callers replace the session's context with
 * the returned value; nothing here mutates its input.
 */

import type { DesignContext, Modification } from "./types";

export function createDesignContext(): DesignContext {
  return { template_uid: null, modifications: [] };
}

export function layerKey(name: string): string {
  return name.trim().toLowerCase();
}

/**
 * Merge `incoming` into `existing` by layer name (case-insensitive).
 * A later value replaces the earlier entry in place, so unaffected entries
 * keep their first-appearance order and no name appears twice.
 */
export function upsertModifications(
  existing: readonly Modification[],
  incoming: readonly Modification[]
): Modification[] {
  const merged = new Map<string, Modification>();
  for (const modification of [...existing, ...incoming]) {
    merged.set(layerKey(modification.name), { ...modification });
  }
  return Array.from(merged.values());
}

export function applyModifications(
  context: DesignContext,
  templateUid: string | null,
  modifications: readonly Modification[]
): DesignContext {
  return {
    template_uid: templateUid ?? context.template_uid,
    modifications: upsertModifications(context.modifications, modifications),
  };
}

export function resetDesignContext(): DesignContext {
  return createDesignContext();
}

export function hasTemplate(context: DesignContext): context is DesignContext & { template_uid: string } {
  return typeof context.template_uid === "string" && context.template_uid.length > 0;
}

export function cloneDesignContext(context: DesignContext): DesignContext {
  return {
    template_uid: context.template_uid,
    modifications: context.modifications.map((modification) => ({ ...modification })),
  };
}
