import { P } from '../engine/params.js';
import type { ReportDefinition } from './types.js';
import { ReportLookupError } from './errors.js';
import {
  buildDecidingFrames,
  buildHeadToHead,
  buildMatchesPlayed,
  buildNeverWonRankingEvent,
  buildTournamentTitles,
  buildTournamentWinPercentage,
  buildTripleCrownTitles,
  buildTripleCrownTitlesPivot,
  buildTripleCrownWorstDefeats,
  buildWhitewashPercentage,
  buildWinPercentage,
} from './matches.js';
import {
  buildCenturyBreaks,
  buildCenturyRate,
  buildMaximumBreaks,
  buildTopBreaksPerTournament,
  buildWorldChampionshipCenturies,
} from './breaks.js';
import {
  buildCountryFootprint,
  buildTournamentEntryOutcomes,
  buildWorldFinalProgression,
} from './extracts.js';

const registry: ReportDefinition[] = [
  {
    id: 'win-percentage',
    title: 'Highest match win percentage',
    group: 'matches',
    defaultMinSample: P.minSample.matches,
    build: buildWinPercentage,
  },
  {
    id: 'matches-played',
    title: 'Most professional matches played',
    group: 'matches',
    defaultMinSample: 0,
    build: buildMatchesPlayed,
  },
  {
    id: 'whitewash-percentage',
    title: 'Most frequent whitewashes',
    group: 'matches',
    defaultMinSample: P.minSample.matches,
    build: buildWhitewashPercentage,
  },
  {
    id: 'tournament-titles',
    title: 'Most tournament titles and most recent win',
    group: 'matches',
    defaultMinSample: null,
    build: buildTournamentTitles,
  },
  {
    id: 'tournament-win-percentage',
    title: 'Share of entered tournaments won, by category',
    group: 'matches',
    defaultMinSample: P.minSample.tournamentEntries,
    build: buildTournamentWinPercentage,
  },
  {
    id: 'never-won-ranking-event',
    title: 'Best players never to win a ranking event',
    group: 'matches',
    defaultMinSample: null,
    build: buildNeverWonRankingEvent,
  },
  {
    id: 'triple-crown-worst-defeats',
    title: 'Worst defeat of each top player at each Triple Crown event',
    group: 'matches',
    defaultMinSample: null,
    build: buildTripleCrownWorstDefeats,
  },
  {
    id: 'deciding-frames',
    title: 'Triple Crown stages with the most deciding frames',
    group: 'matches',
    defaultMinSample: P.minSample.stageMatches,
    build: buildDecidingFrames,
  },
  {
    id: 'triple-crown-titles',
    title: 'Triple Crown titles with player and grand totals',
    group: 'matches',
    defaultMinSample: null,
    limitsRows: true,
    build: buildTripleCrownTitles,
  },
  {
    id: 'triple-crown-titles-pivot',
    title: 'Triple Crown titles by event',
    group: 'matches',
    defaultMinSample: null,
    build: buildTripleCrownTitlesPivot,
  },
  {
    id: 'head-to-head',
    title: 'Best and worst opponent of each title winner',
    group: 'matches',
    defaultMinSample: P.minSample.headToHeadMeetings,
    build: buildHeadToHead,
  },
  {
    id: 'century-breaks',
    title: 'Most century breaks',
    group: 'breaks',
    defaultMinSample: null,
    build: buildCenturyBreaks,
  },
  {
    id: 'maximum-breaks',
    title: 'Most maximum breaks',
    group: 'breaks',
    defaultMinSample: null,
    build: buildMaximumBreaks,
  },
  {
    id: 'top-breaks-per-tournament',
    title: 'Three highest breaks of each tournament',
    group: 'breaks',
    defaultMinSample: null,
    build: buildTopBreaksPerTournament,
  },
  {
    id: 'century-rate',
    title: 'Tournaments with the most centuries per frame',
    group: 'breaks',
    defaultMinSample: 1,
    build: buildCenturyRate,
  },
  {
    id: 'world-championship-centuries',
    title: 'Centuries at each World Championship with trend and record',
    group: 'breaks',
    defaultMinSample: null,
    build: buildWorldChampionshipCenturies,
  },
  {
    id: 'world-final-progression',
    title: 'Frame-by-frame progress of World Championship finals',
    group: 'extracts',
    defaultMinSample: null,
    build: buildWorldFinalProgression,
  },
  {
    id: 'tournament-entry-outcomes',
    title: 'Tournament entries and outcomes per player',
    group: 'extracts',
    defaultMinSample: null,
    build: buildTournamentEntryOutcomes,
  },
  {
    id: 'country-footprint',
    title: 'Professional players and tournaments per country',
    group: 'extracts',
    defaultMinSample: null,
    build: buildCountryFootprint,
  },
];

const byId = new Map(registry.map((report) => [report.id, report]));

export const listReports = () =>
  registry.map((report) => ({
    id: report.id,
    title: report.title,
    group: report.group,
    defaultMinSample: report.defaultMinSample,
  }));

export const getReport = (reportId: string): ReportDefinition => {
  const report = byId.get(reportId);
  if (!report) throw new ReportLookupError(reportId);
  return report;
};
