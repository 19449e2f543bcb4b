import type { CourtSurface, KnownSurface } from "./types.js";

const BLANK_MARKERS = new Set(["", "nan", "none", "null", "n/a", "-"]);
const CANONICAL_BLANK_MARKERS = new Set(["", "nan", "none"]);
const KNOWN_SURFACES: readonly KnownSurface[] = ["hard", "clay", "grass"];
const INDOOR_RE = /\(?\bindoors?\b\)?/g;
const OUTDOOR_RE = /\(?\boutdoors?\b\)?/g;
const DURATION_RE = /^(\d{1,2}):(\d{2})$/;
const SCORE_RE = /^\d{1,2}$/;

export function normalizeWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

export function normalizeName(name: string): string {
  return normalizeWhitespace(name)
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, "")
    .replace(/\s+/g, " ")
    .trim();
}

export function isBlank(value: string | undefined | null): boolean {
  if (value === undefined || value === null) {
    return true;
  }
  return BLANK_MARKERS.has(normalizeWhitespace(value).toLowerCase());
}

/**
 * Whether a canonical cell may be filled. Placeholders such as "-" or "n/a"
 * are curated values and stay.
 */
export function isCanonicalBlank(value: string | undefined | null): boolean {
  if (value === undefined || value === null) {
    return true;
  }
  return CANONICAL_BLANK_MARKERS.has(value.trim().toLowerCase());
}

/** Whitespace-normalized text, or undefined for blank cells. */
export function cleanText(value: string | undefined | null): string | undefined {
  if (isBlank(value)) {
    return undefined;
  }
  return normalizeWhitespace(String(value));
}

export function cleanScore(value: string | undefined): string | undefined {
  const text = cleanText(value);
  if (!text) {
    return undefined;
  }
  return SCORE_RE.test(text) ? text : undefined;
}

/** Keeps `H:MM` durations as written; anything else is dropped. */
export function cleanDuration(value: string | undefined): string | undefined {
  const text = cleanText(value);
  if (!text) {
    return undefined;
  }
  const match = text.match(DURATION_RE);
  if (!match || Number(match[2]) > 59) {
    return undefined;
  }
  return text;
}

export function parseCourtSurface(raw: string): CourtSurface {
  const text = normalizeWhitespace(raw).toLowerCase();
  const indoor = text.match(INDOOR_RE) !== null;
  const core = normalizeWhitespace(text.replace(INDOOR_RE, " ").replace(OUTDOOR_RE, " "));
  const surface = KNOWN_SURFACES.find((candidate) => candidate === core);
  if (!surface) {
    return { kind: "unrecognized", raw };
  }
  return { kind: "known", surface, indoor };
}

export function formatCourtSurface(surface: KnownSurface, indoor: boolean): string {
  const label = surface.charAt(0).toUpperCase() + surface.slice(1);
  return indoor ? `${label} (indoor)` : label;
}
