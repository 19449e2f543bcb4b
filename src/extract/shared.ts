import { normalizeWhitespace } from "../normalize.js";
import { PLAYER_HREF_RE } from "../selectors.js";

export function extractPlayerId(href: string | undefined): string | undefined {
  if (!href) {
    return undefined;
  }
  return href.match(PLAYER_HREF_RE)?.[1];
}

/**
 * Surface from an overline like `Raleigh, NC, HARD - Quarter-finals`:
 * the last comma segment before ` - `.
 */
export function surfaceFromOverline(text: string): string | undefined {
  const value = normalizeWhitespace(text);
  if (!value.includes(",") || !value.includes(" - ")) {
    return undefined;
  }
  const beforeDash = value.split(" - ", 1)[0].trim();
  const segments = beforeDash.split(",");
  const surface = segments[segments.length - 1].trim().toUpperCase();
  return surface || undefined;
}

export function composeCourtType(surface: string | undefined, indoor: boolean): string | undefined {
  if (!surface) {
    return undefined;
  }
  if (!indoor) {
    return surface;
  }
  const title = surface.charAt(0).toUpperCase() + surface.slice(1).toLowerCase();
  return `${title} (indoor)`;
}
