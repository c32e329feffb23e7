// Interview Coach Engine - Transcription boundary
// Speech-to-text runs outside the engine. Its result arrives as a tagged
// outcome, and only successful transcripts are ever analyzed.

import type { TranscriptionOutcome } from "./types.js";

export const NO_CONTENT_REASON = "No content detected";

export function transcribed(text: string): TranscriptionOutcome {
  return { ok: true, text };
}

export function transcriptionFailed(reason: string): TranscriptionOutcome {
  const trimmed = reason.trim();
  return { ok: false, reason: trimmed.length > 0 ? trimmed : "Transcription failed" };
}

/**
 * Convert a raw provider string into an outcome. Some providers report
 * failures in-band as a bracketed message ("[No speech detected]"); a string
 * that is entirely such a marker becomes a failure carrying the inner text.
 * Blank input is a failure too.
 */
export function fromLegacyTranscript(raw: string): TranscriptionOutcome {
  const trimmed = raw.trim();
  if (trimmed.length === 0) {
    return transcriptionFailed(NO_CONTENT_REASON);
  }

  const marker = markerContent(trimmed);
  if (marker !== null) {
    return transcriptionFailed(marker);
  }

  return transcribed(trimmed);
}

/** Inner text when the opening bracket closes on the final character, else null. Nested brackets are allowed. */
function markerContent(text: string): string | null {
  if (!text.startsWith("[") || !text.endsWith("]")) return null;
  let depth = 0;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === "[") depth++;
    else if (ch === "]") depth--;
    if (depth === 0) return i === text.length - 1 ? text.slice(1, -1) : null;
  }
  return null;
}
