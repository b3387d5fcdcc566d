import { getEnv } from "@/configuration";
import { resolveProvider } from "@/services/ai";
import { CommentaryService } from "./service";

export * from "./service";
export * from "./snark";

let instance: CommentaryService | null = null;

/** Process-wide commentary, built from the environment on first use. */
export function getCommentary(): CommentaryService {
  if (!instance) {
    const env = getEnv();
    instance = new CommentaryService({ provider: resolveProvider(env), persona: env.BOT_PERSONA });
  }
  return instance;
}
