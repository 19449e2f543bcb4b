import { normalizeName } from "../normalize.js";
import type { HomeAwayVerdict, MatchRecord, PageModel } from "../types.js";

type Orientation = "straight" | "crossed" | "both" | "none";
type NameTier = (a: string, b: string) => boolean;

const NAME_TIERS: readonly NameTier[] = [exactName, tokenContainment];

/**
 * Page order is authoritative: top participant is home. Ids decide when both
 * sides have both ids and exactly one orientation fits; names decide
 * otherwise, and a tie between orientations is an error, not a guess.
 */
export function verifyHomeAway(match: MatchRecord, page: PageModel): HomeAwayVerdict {
  const byId = orientById(match, page);
  if (byId === "straight") {
    return { status: "correct", method: "id_match" };
  }
  if (byId === "crossed") {
    return { status: "swapped", method: "id_match" };
  }

  const csvHome = normalizeName(match.homeName);
  const csvAway = normalizeName(match.awayName);
  const pageHome = normalizeName(page.home.name ?? "");
  const pageAway = normalizeName(page.away.name ?? "");
  if (!csvHome || !csvAway || !pageHome || !pageAway) {
    return {
      status: "error",
      method: "name_match",
      reason: "home/away unresolved: player name missing",
    };
  }

  for (const tier of NAME_TIERS) {
    const orientation = orient(
      tier(csvHome, pageHome) && tier(csvAway, pageAway),
      tier(csvHome, pageAway) && tier(csvAway, pageHome),
    );
    if (orientation === "straight") {
      return { status: "correct", method: "name_match" };
    }
    if (orientation === "crossed") {
      return { status: "swapped", method: "name_match" };
    }
    if (orientation === "both") {
      return {
        status: "error",
        method: "name_match",
        reason: `home/away ambiguous: "${match.homeName}" and "${match.awayName}" fit both page sides`,
      };
    }
  }

  return {
    status: "error",
    method: "name_match",
    reason:
      `home/away unresolved: "${match.homeName} vs ${match.awayName}" ` +
      `does not match page "${page.home.name ?? ""} vs ${page.away.name ?? ""}"`,
  };
}

function orientById(match: MatchRecord, page: PageModel): Orientation {
  const csvHome = match.homeId;
  const csvAway = match.awayId;
  const pageHome = page.home.id;
  const pageAway = page.away.id;
  if (!csvHome || !csvAway || !pageHome || !pageAway) {
    return "none";
  }
  return orient(
    csvHome === pageHome && csvAway === pageAway,
    csvHome === pageAway && csvAway === pageHome,
  );
}

function orient(straight: boolean, crossed: boolean): Orientation {
  if (straight && crossed) {
    return "both";
  }
  if (straight) {
    return "straight";
  }
  return crossed ? "crossed" : "none";
}

function exactName(a: string, b: string): boolean {
  return a === b;
}

/**
 * Every token of the shorter name appears in the longer one; a one-letter
 * token stands for an initial (`smith j` fits `john smith`).
 */
function tokenContainment(a: string, b: string): boolean {
  const aTokens = a.split(" ").filter(Boolean);
  const bTokens = b.split(" ").filter(Boolean);
  const [shorter, longer] = aTokens.length <= bTokens.length ? [aTokens, bTokens] : [bTokens, aTokens];
  if (shorter.length === 0) {
    return false;
  }
  const pool = [...longer];
  return shorter.every((token) => {
    const index = pool.findIndex((candidate) => tokensMatch(token, candidate));
    if (index < 0) {
      return false;
    }
    pool.splice(index, 1);
    return true;
  });
}

function tokensMatch(a: string, b: string): boolean {
  if (a === b) {
    return true;
  }
  if (a.length === 1) {
    return b.startsWith(a);
  }
  return b.length === 1 && a.startsWith(b);
}
