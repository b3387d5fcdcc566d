/**
 * Canned one-liners used for refusals and when no AI provider is configured.
 * A line is "{tone}, {target}, {addon}" with the addon picked per category.
 */
import { z } from "zod";
import rawLines from "./snark-lines.json";

export type SnarkRandom = () => number;

const SnarkLinesSchema = z.object({
  tones: z.array(z.string()).min(1),
  targets: z.array(z.string()).min(1),
  addons: z.record(z.array(z.string()).min(1)),
});

const lines = SnarkLinesSchema.parse(rawLines);

export const UNKNOWN_SNARK_ADDON = "I have no idea what you're asking for.";

export type SnarkCategory =
  | "game_already_running"
  | "nothing_to_stop"
  | "rounds_out_of_range"
  | "guild_only"
  | "correct_answer"
  | "nobody_got_it"
  | "hint_1"
  | "hint_2"
  | "hint_3";

function pick(options: readonly string[], random: SnarkRandom): string {
  const index = Math.min(options.length - 1, Math.floor(random() * options.length));
  return options[index] ?? "";
}

export function snark(category: SnarkCategory | (string & {}), random: SnarkRandom = Math.random): string {
  const tone = pick(lines.tones, random);
  const target = pick(lines.targets, random);
  const addon = pick(lines.addons[category] ?? [UNKNOWN_SNARK_ADDON], random);
  return `${tone}, ${target}, ${addon}`;
}

/** Appends a snark line to a refusal message. */
export function withSnark(
  message: string,
  category: SnarkCategory,
  random: SnarkRandom = Math.random,
): string {
  return `${message}\n> ${snark(category, random)}`;
}
