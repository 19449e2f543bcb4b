export const MATCH_PAGE = {
  homeParticipant: "div.duelParticipant__home",
  awayParticipant: "div.duelParticipant__away",
  participantName: "a.participant__participantName, div.participant__participantName",
  participantLink: "a.participant__participantLink, a[href*='/player/']",
  startTime: "div.duelParticipant__startTime div",
  overline: "span[data-testid='wcl-scores-overline-03']",
  infoBox: "div.infoBox__info",
  overallTime: "div.smh__time.smh__time--overall",
} as const;

export function setScoreSelector(side: "home" | "away", setNumber: number): string {
  return `div.smh__part.smh__${side}.smh__part--${setNumber}`;
}

/** Set durations are zero-based on the page: `--0` is set 1. */
export function setTimeSelector(setIndex: number): string {
  return `div.smh__time.smh__time--${setIndex}`;
}

export const PLAYER_HREF_RE = /\/player\/[^/]+\/([A-Za-z0-9]+)\/?/;
export const PLAYED_INDOOR_TEXT = "played indoor";
