/**
 * Terminal chat against the design assistant.
 *
 *   npm run chat
 *
 * Type a message, `/upload <path>` to attach an image to the next message,
 * or `/quit`.
 */
import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { createInterface } from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";
import { getDesignServices, handleTurn, prepareChat, sessionStore } from "../app/services/design";
import { generateRequestId } from "../app/utils/logger.server";
import { validateContentType } from "../app/utils/validation.server";

const EXTENSION_TYPES: Record<string, string> = {
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".webp": "image/webp",
};

async function main(): Promise<number> {
  const readiness = await prepareChat(generateRequestId());
  if (!readiness.ok) {
    console.error(readiness.message);
    return 1;
  }

  const session = sessionStore.getOrCreate();
  const services = getDesignServices();
  const rl = createInterface({ input, output });

  console.log(`Assistant: ${session.messages[0].content}`);

  try {
    for (;;) {
      const line = (await rl.question("You: ")).trim();
      if (!line) continue;
      if (line === "/quit" || line === "/exit") break;

      if (line.startsWith("/upload ")) {
        const path = line.slice("/upload ".length).trim();
        const contentType = validateContentType(EXTENSION_TYPES[extname(path).toLowerCase()] ?? "");
        if (!contentType.valid) {
          console.log(`Cannot attach ${path}: ${contentType.error}`);
          continue;
        }
        try {
          session.stageImage({ bytes: await readFile(path), contentType: contentType.sanitized, filename: path });
          console.log("Image attached. Now tell me what it is for.");
        } catch (error) {
          console.log(`Cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`);
        }
        continue;
      }

      const result = await handleTurn(session, line, {
        services,
        catalog: readiness.catalog,
        requestId: generateRequestId(),
      });
      console.log(`Assistant: ${result.reply}`);
    }
  } finally {
    rl.close();
  }
  return 0;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  }
);
