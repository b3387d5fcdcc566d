/**
 * Normalises the stored answer list of a question.
 *
 * Rows written by older importers hold either a JSON array, a JSON-encoded
 * string or a bare string, so reads accept all of them.
 */
export const parseAnswers = (raw: unknown): string[] => {
  if (raw === null || raw === undefined) return [];
  if (Array.isArray(raw)) return raw.map((entry) => String(entry));
  if (typeof raw === "string") {
    try {
      const parsed: unknown = JSON.parse(raw);
      if (Array.isArray(parsed)) return parsed.map((entry) => String(entry));
      return [String(parsed)];
    } catch {
      return [raw];
    }
  }
  return [String(raw)];
};
