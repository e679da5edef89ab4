export {
  gamesPlayed,
  winPercentage,
  sortStandingsForSeeding,
  computeByeSeeds,
  type StandingForSeeding,
} from './seeding';

export {
  resolveMatchupWinner,
  rankByCumulativePoints,
  roundPoints,
  type MatchupForResolution,
  type CumulativeEntry,
} from './bracket';

export { ordinal, placeLabel } from './labels';
