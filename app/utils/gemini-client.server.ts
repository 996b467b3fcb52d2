// Gemini client shared by the design oracle and the listing mapper
import { GoogleGenAI, type GenerateContentResponse } from "@google/genai";
import { logger, createLogContext } from "./logger.server";
import { ConfigurationError, readEnv } from "./env.server";
import type { OracleReply } from "~/services/design/types";

export type GeminiModels = Pick<GoogleGenAI["models"], "generateContent">;

/**
 * Error thrown when a Gemini API call times out
 */
export class GeminiTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Gemini API call timed out after ${timeoutMs}ms`);
    this.name = "GeminiTimeoutError";
  }
}

export function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  let timeoutId: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new GeminiTimeoutError(timeoutMs));
    }, timeoutMs);
  });

  return Promise.race([promise, timeoutPromise]).finally(() => {
    if (timeoutId) {
      clearTimeout(timeoutId);
    }
  });
}

// Lazy so a missing key only fails the first call, not module load
let ai: GoogleGenAI | null = null;

export function getGeminiClient(): GoogleGenAI {
  if (!ai) {
    const apiKey = readEnv("GEMINI_API_KEY");
    if (!apiKey) {
      throw new ConfigurationError(["GEMINI_API_KEY"]);
    }
    ai = new GoogleGenAI({ apiKey });
    logger.info(createLogContext("system", "init", "gemini-client"), "Gemini client initialized");
  }
  return ai;
}

export function getGeminiModels(): GeminiModels {
  return getGeminiClient().models;
}

/**
 * Reduce a generateContent response to the oracle's three outcomes.
 * A call to any function other than `functionName` counts as no answer.
 */
export function readOracleReply(
  response: GenerateContentResponse | null | undefined,
  functionName: string
): OracleReply {
  if (!response) {
    return { kind: "none", reason: "no response" };
  }

  const calls = response.functionCalls ?? [];
  const call = calls.find((candidate) => candidate.name === functionName);
  if (call) {
    return { kind: "call", name: functionName, args: call.args ?? {} };
  }
  if (calls.length > 0) {
    return { kind: "none", reason: `unexpected function call: ${calls[0].name ?? "(unnamed)"}` };
  }

  const text = response.text?.trim();
  if (text) {
    return { kind: "text", text };
  }
  return { kind: "none", reason: "empty response" };
}
