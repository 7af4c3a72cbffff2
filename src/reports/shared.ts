import { P, TRIPLE_CROWN_EVENTS } from '../engine/params.js';
import type { TripleCrownEvent } from '../engine/params.js';
import type { MatchView } from '../engine/types.js';

export const isProfessional = (match: Pick<MatchView, 'status'>) => match.status === P.professionalStatus;

export const isRanking = (category: string) => category === P.rankingCategory;

/** Exact, case-sensitive: 'final' or 'FINAL' label other stages in the source data. */
export const isFinalStage = (stage: string) => stage === P.finalStage;

export const isCrucibleStage = (stage: string) => P.crucibleStages.some((label) => label === stage);

export const isTitle = (match: MatchView) =>
  isFinalStage(match.stage) && isProfessional(match) && match.outcome === 'decided';

export const asTripleCrownEvent = (name: string): TripleCrownEvent | undefined =>
  TRIPLE_CROWN_EVENTS.find((event) => event === name);

export const isTripleCrown = (name: string) => asTripleCrownEvent(name) !== undefined;

export const normalizeCountry = (country: string) =>
  P.homeNations.some((nation) => nation === country) ? P.unitedKingdom : country;

export const editionKey = (name: string, year: number) => `${year}\u0000${name}`;

