import { describe, it, expect } from "vitest";
import {
  MAX_MESSAGE_LENGTH,
  validateChatMessage,
  validateContentType,
  validateSessionId,
} from "~/utils/validation.server";

describe("validation", () => {
  describe("validateSessionId", () => {
    it("accepts uuid-like ids", () => {
      expect(validateSessionId(" 3f1c2a9e-7b44-4d0a-9c1e-2b7f0d8a6e55 ")).toEqual({
        valid: true,
        sanitized: "3f1c2a9e-7b44-4d0a-9c1e-2b7f0d8a6e55",
      });
    });

    it("rejects short ids and bad characters", () => {
      expect(validateSessionId("abc").valid).toBe(false);
      expect(validateSessionId("session/../../etc").valid).toBe(false);
      expect(validateSessionId(12345678901).valid).toBe(false);
    });
  });

  describe("validateChatMessage", () => {
    it("trims the message", () => {
      expect(validateChatMessage("  hello  ")).toEqual({ valid: true, sanitized: "hello" });
    });

    it("rejects empty and oversized messages", () => {
      expect(validateChatMessage("   ")).toEqual({ valid: false, error: "Message cannot be empty" });
      expect(validateChatMessage("x".repeat(MAX_MESSAGE_LENGTH + 1))).toEqual({
        valid: false,
        error: `Message exceeds ${MAX_MESSAGE_LENGTH} characters`,
      });
      expect(validateChatMessage(undefined)).toEqual({ valid: false, error: "Message must be a string" });
    });
  });

  describe("validateContentType", () => {
    it("normalizes image/jpg", () => {
      expect(validateContentType("IMAGE/JPG")).toEqual({ valid: true, sanitized: "image/jpeg" });
    });

    it("rejects types outside the allow list", () => {
      expect(validateContentType("image/gif").valid).toBe(false);
    });
  });
});
