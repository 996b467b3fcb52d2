import { describe, it, expect } from "vitest";
import { parseModificationList, validateDecision } from "~/services/design/decision-validator.server";

describe("decision-validator", () => {
  it("accepts a CONVERSE decision and uppercases the action", () => {
    const result = validateDecision({ action: "converse", response_text: "Hi there!" });
    expect(result).toEqual({ ok: true, decision: { action: "CONVERSE", response_text: "Hi there!" }, issues: [] });
  });

  it("accepts MODIFY without a template_uid", () => {
    const result = validateDecision({
      action: "MODIFY",
      response_text: "Updated.",
      modifications: [{ name: "price", text: "$1" }],
    });
    expect(result).toEqual({
      ok: true,
      decision: {
        action: "MODIFY",
        response_text: "Updated.",
        template_uid: null,
        modifications: [{ name: "price", text: "$1" }],
      },
      issues: [],
    });
  });

  it("drops malformed modification items and reports them", () => {
    const result = validateDecision({
      action: "MODIFY",
      template_uid: "tpl-1",
      response_text: "Done.",
      modifications: [{ name: "bedrooms", text: 3 }, { text: "orphan" }, "junk", { name: "photo" }],
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.decision).toEqual({
      action: "MODIFY",
      response_text: "Done.",
      template_uid: "tpl-1",
      modifications: [{ name: "bedrooms", text: "3" }],
    });
    expect(result.issues).toEqual([
      "modifications[1].name: required non-empty string",
      "modifications[2]: expected object",
      "modifications[3]: needs text or image_url",
    ]);
  });

  it("rejects an unknown action but keeps the response text as fallback", () => {
    const result = validateDecision({ action: "DANCE", response_text: "Let's dance" });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.fallbackText).toBe("Let's dance");
  });

  it("rejects a decision without response_text and has no fallback", () => {
    const result = validateDecision({ action: "GENERATE" });
    expect(result).toEqual({ ok: false, issues: ["response_text: required non-empty string"], fallbackText: null });
  });

  it("rejects a non-string template_uid", () => {
    const result = validateDecision({ action: "MODIFY", template_uid: 42, response_text: "ok" });
    expect(result).toEqual({ ok: false, issues: ["template_uid: must be string|null"], fallbackText: "ok" });
  });

  it("rejects modifications that are not a list", () => {
    const result = validateDecision({ action: "MODIFY", response_text: "ok", modifications: "price=1" });
    expect(result).toEqual({ ok: false, issues: ["modifications: expected array"], fallbackText: "ok" });
  });

  it("parseModificationList treats a missing list as empty", () => {
    expect(parseModificationList(undefined)).toEqual({ modifications: [], issues: [] });
  });
});
