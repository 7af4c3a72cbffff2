export const TRIPLE_CROWN_EVENTS = ['World Championship', 'Masters', 'UK Championship'] as const;

export type TripleCrownEvent = (typeof TRIPLE_CROWN_EVENTS)[number];

export const P = {
  professionalStatus: 'Professional',
  rankingCategory: 'Ranking',
  finalStage: 'Final',
  // Stages played at the Crucible (Last 32 onward).
  crucibleStages: ['Final', 'Semi-Final', 'Quarter-Final', 'Last 16', 'Last 32'],
  percentDigits: 3,
  minSample: {
    matches: 100,
    tournamentEntries: 100,
    stageMatches: 30,
    headToHeadMeetings: 10,
  },
  whitewashMinWinnerScore: 6,
  headToHeadMinWinnerScore: 4,
  topPlayersLimit: 40,
  topBreaksPerTournament: 3,
  century: 100,
  maximum: 147,
  breakRange: { min: 50, max: 147 },
  // Trailing window: 4 preceding editions plus the current one.
  centuryTrendPreceding: 4,
  homeNations: ['England', 'Scotland', 'Wales', 'Northern Ireland'],
  unitedKingdom: 'United Kingdom',
  rollupLabels: { allPlayers: 'All Players', total: 'Total' },
} as const;
