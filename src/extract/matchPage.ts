import * as cheerio from "cheerio";
import type { AnyNode } from "domhandler";
import { PageParseError } from "../common/errors.js";
import { normalizeWhitespace } from "../normalize.js";
import {
  MATCH_PAGE,
  PLAYED_INDOOR_TEXT,
  setScoreSelector,
  setTimeSelector,
} from "../selectors.js";
import type { PageModel, PagePlayer, PageSetScore } from "../types.js";
import { composeCourtType, extractPlayerId, surfaceFromOverline } from "./shared.js";

type Side = "home" | "away";

/**
 * Reads one rendered match page. Throws PageParseError when either
 * participant is missing, which usually means the page did not finish
 * rendering.
 */
export function parseMatchPage(html: string): PageModel {
  const $ = cheerio.load(html);

  const home = readParticipant($, MATCH_PAGE.homeParticipant);
  if (!home.name) {
    throw new PageParseError("Home player extraction failed: participant name not found");
  }
  const away = readParticipant($, MATCH_PAGE.awayParticipant);
  if (!away.name) {
    throw new PageParseError("Away player extraction failed: participant name not found");
  }

  const sets: [PageSetScore, PageSetScore, PageSetScore] = [
    readSet($, 1),
    readSet($, 2),
    readSet($, 3),
  ];

  const overall = textOf($(MATCH_PAGE.overallTime).first());
  const setTimes: [string | undefined, string | undefined, string | undefined] = [
    textOf($(setTimeSelector(0)).first()),
    textOf($(setTimeSelector(1)).first()),
    textOf($(setTimeSelector(2)).first()),
  ];

  return {
    home,
    away,
    sets,
    durations: { overall, sets: setTimes },
    dateTime: textOf($(MATCH_PAGE.startTime).first()),
    courtType: readCourtType($),
  };
}

function readParticipant($: cheerio.CheerioAPI, rootSelector: string): PagePlayer {
  const root = $(rootSelector).first();
  if (root.length === 0) {
    return {};
  }
  const name = textOf(root.find(MATCH_PAGE.participantName).first());
  const href = root.find(MATCH_PAGE.participantLink).first().attr("href");
  return { name, id: extractPlayerId(href) };
}

function readSet($: cheerio.CheerioAPI, setNumber: number): PageSetScore {
  const home = readSetCell($, "home", setNumber);
  const away = readSetCell($, "away", setNumber);
  return {
    home: home.score,
    away: away.score,
    tiebreakHome: home.tiebreak,
    tiebreakAway: away.tiebreak,
  };
}

function readSetCell(
  $: cheerio.CheerioAPI,
  side: Side,
  setNumber: number,
): { score?: string; tiebreak?: string } {
  const cell = $(setScoreSelector(side, setNumber)).first();
  if (cell.length === 0) {
    return {};
  }
  const sup = cell.find("sup").first();
  const tiebreak = textOf(sup);
  sup.remove();
  return { score: textOf(cell), tiebreak };
}

function readCourtType($: cheerio.CheerioAPI): string | undefined {
  const surface = $(MATCH_PAGE.overline)
    .toArray()
    .map((element) => surfaceFromOverline($(element).text()))
    .find((value): value is string => typeof value === "string");

  const indoor = $(MATCH_PAGE.infoBox)
    .toArray()
    .some((element) => normalizeWhitespace($(element).text()).toLowerCase().includes(PLAYED_INDOOR_TEXT));

  return composeCourtType(surface, indoor);
}

function textOf<T extends AnyNode>(selection: cheerio.Cheerio<T>): string | undefined {
  if (selection.length === 0) {
    return undefined;
  }
  const text = normalizeWhitespace(selection.text());
  return text || undefined;
}
