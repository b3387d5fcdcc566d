const USER_MENTION = /<@!?\d+>/g;

/** Removes user mention tokens (`<@id>`, `<@!id>`) and tidies the spacing left behind. */
export function stripUserMentions(text: string): string {
  return text.replace(USER_MENTION, " ").replace(/\s+/g, " ").trim();
}
