/**
 * Oracle output validation
 *
 * Function-call arguments arrive as loosely typed JSON. They are checked here,
 * once, and turned into the DesignDecision union; nothing downstream reads the
 * raw arguments.
 */

import { DESIGN_ACTIONS, type DesignAction, type DesignDecision, type Modification } from "./types";

export type DecisionValidation =
  | { ok: true; decision: DesignDecision; issues: string[] }
  | { ok: false; issues: string[]; fallbackText: string | null };

export interface ModificationParseResult {
  modifications: Modification[];
  issues: string[];
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function isDesignAction(value: string): value is DesignAction {
  const actions: readonly string[] = DESIGN_ACTIONS;
  return actions.includes(value);
}

function readText(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return undefined;
}

/**
 * Keep well-formed items, report the rest. An item needs a non-empty `name`
 * and a `text` or `image_url`; numeric text is accepted as a string.
 */
export function parseModificationList(value: unknown): ModificationParseResult {
  const issues: string[] = [];
  const modifications: Modification[] = [];

  if (value === undefined || value === null) {
    return { modifications, issues };
  }
  if (!Array.isArray(value)) {
    return { modifications, issues: ["modifications: expected array"] };
  }

  value.forEach((item, index) => {
    if (!isPlainObject(item)) {
      issues.push(`modifications[${index}]: expected object`);
      return;
    }
    const name = typeof item.name === "string" ? item.name.trim() : "";
    if (!name) {
      issues.push(`modifications[${index}].name: required non-empty string`);
      return;
    }

    const text = readText(item.text);
    const imageUrl = typeof item.image_url === "string" && item.image_url.trim() ? item.image_url.trim() : undefined;
    if (text === undefined && imageUrl === undefined) {
      issues.push(`modifications[${index}]: needs text or image_url`);
      return;
    }

    const modification: Modification = { name };
    if (text !== undefined) modification.text = text;
    if (imageUrl !== undefined) modification.image_url = imageUrl;
    modifications.push(modification);
  });

  return { modifications, issues };
}

export function validateDecision(args: unknown): DecisionValidation {
  if (!isPlainObject(args)) {
    return { ok: false, issues: ["root: expected object"], fallbackText: null };
  }

  const responseText = typeof args.response_text === "string" ? args.response_text.trim() : "";
  const fallbackText = responseText || null;

  const rawAction = typeof args.action === "string" ? args.action.trim().toUpperCase() : "";
  if (!isDesignAction(rawAction)) {
    return {
      ok: false,
      issues: [`action: invalid value "${String(args.action)}" (allowed: ${DESIGN_ACTIONS.join(", ")})`],
      fallbackText,
    };
  }
  if (!responseText) {
    return { ok: false, issues: ["response_text: required non-empty string"], fallbackText: null };
  }

  switch (rawAction) {
    case "CONVERSE":
    case "GENERATE":
    case "RESET":
      return { ok: true, decision: { action: rawAction, response_text: responseText }, issues: [] };
    case "MODIFY": {
      const rawUid = args.template_uid;
      if (rawUid !== undefined && rawUid !== null && typeof rawUid !== "string") {
        return { ok: false, issues: ["template_uid: must be string|null"], fallbackText };
      }
      const templateUid = typeof rawUid === "string" && rawUid.trim() ? rawUid.trim() : null;
      const parsed = parseModificationList(args.modifications);
      if (parsed.issues.includes("modifications: expected array")) {
        return { ok: false, issues: parsed.issues, fallbackText };
      }
      return {
        ok: true,
        decision: {
          action: "MODIFY",
          response_text: responseText,
          template_uid: templateUid,
          modifications: parsed.modifications,
        },
        issues: parsed.issues,
      };
    }
  }
}
