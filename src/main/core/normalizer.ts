const DISALLOWED = /[^\p{L}\p{N} ?!.,'-]/gu;

/**
 * Canonical command form: lowercase, whitespace collapsed to single spaces,
 * only letters, digits, spaces and `? ! . , ' -` kept, trimmed.
 */
export const normalize = (text: string): string => {
  if (typeof text !== "string" || !text) {
    return "";
  }

  return text
    .toLowerCase()
    .replace(/\s+/g, " ")
    .replace(DISALLOWED, "")
    .replace(/ {2,}/g, " ")
    .trim();
};
