/**
 * Readiness contract between the validation prompt and the validation stage.
 *
 * The validation prompt instructs the model to emit {@link READINESS_MARKER}
 * verbatim when nothing is missing. The check is a case- and encoding-sensitive
 * substring test; anything else keeps the case in the validation loop.
 */
export const READINESS_MARKER_VERSION = 1;

/** U+2705 WHITE HEAVY CHECK MARK, a space, then "Yes". UTF-8: e2 9c 85 20 59 65 73. */
export const READINESS_MARKER = "✅ Yes";

/**
 * The same marker after a UTF-8 → Windows-1252 round trip ("âœ… Yes").
 * Earlier builds compared against this string, which a model answering in
 * proper UTF-8 never produces. Kept only so tests can pin that it is not accepted.
 */
export const MISENCODED_READINESS_MARKER = "\u00e2\u0153\u2026 Yes";

export function isReady(text: string): boolean {
  return text.includes(READINESS_MARKER);
}
