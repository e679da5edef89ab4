/**
 * Playoff cohort and bracket models
 */
import { Game } from '../games/games.model';

export const ROUND_NAMES = [
  'round_1',
  'semifinal',
  'championship',
  'third_place',
  'fifth_place',
  'seventh_place',
  'ninth_place',
  'eleventh_place',
  'mediocre_bowl',
  'toilet_bowl',
] as const;

export type RoundName = (typeof ROUND_NAMES)[number];

export const DEFAULT_GAME_LABELS: Readonly<Record<RoundName, string>> = {
  round_1: 'First Round',
  semifinal: 'Semifinal',
  championship: 'Championship Game',
  third_place: 'Third Place Game',
  fifth_place: 'Fifth Place Game',
  seventh_place: 'Seventh Place Game',
  ninth_place: 'Ninth Place Game',
  eleventh_place: 'Eleventh Place Game',
  mediocre_bowl: 'Mediocre Bowl',
  toilet_bowl: 'Toilet Bowl',
};

export type CohortName = 'championship' | 'middle' | 'consolation';

/**
 * A seeded team inside a cohort. Seeds are global: the first middle-cohort
 * seed is championshipSize + 1.
 */
export interface CohortMember {
  seed: number;
  teamId: string;
  teamName: string;
}

export interface SeasonCohorts {
  championship: CohortMember[];
  middle: CohortMember[];
  consolation: CohortMember[];
}

/**
 * One resolved tournament game. Read-only once created.
 * placeAwarded is the place the winner takes; the loser takes the next one.
 * Games that only feed a later round (or a cumulative total) award nothing.
 */
export interface BracketNode {
  readonly cohort: CohortName;
  readonly roundName: RoundName;
  readonly label: string;
  readonly week: number;
  readonly game: Game;
  readonly winnerId: string;
  readonly loserId: string;
  readonly placeAwarded: number | null;
}

/**
 * Everything one cohort contributes to the final standings.
 * A team absent from placements was never reached by a placement game and is
 * left for the assembler's fallback.
 */
export interface CohortResult {
  cohort: CohortName;
  nodes: BracketNode[];
  placements: Map<string, number>;
  syntheticGames: Game[];
}

export type ChampionshipState = 'SEEDED' | 'ROUND1_COMPLETE' | 'SEMIFINAL_COMPLETE' | 'RESOLVED';

export type PlacementGroupState = 'SEEDED' | 'ROUND1_COMPLETE' | 'RESOLVED';

export function emptyCohortResult(cohort: CohortName): CohortResult {
  return { cohort, nodes: [], placements: new Map(), syntheticGames: [] };
}

/**
 * Record the winner at placeAwarded and the loser right behind it.
 */
export function recordPlacement(result: CohortResult, node: BracketNode): void {
  if (node.placeAwarded === null) return;
  result.placements.set(node.winnerId, node.placeAwarded);
  result.placements.set(node.loserId, node.placeAwarded + 1);
}
