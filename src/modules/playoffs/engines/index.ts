/**
 * Playoff Engines Module
 *
 * Cohort engines walk recorded playoff games week by week and resolve them
 * into bracket nodes and placements. Engines hold state for one season only.
 *
 * Available engines:
 * - ChampionshipEngine: championship cohort (with or without byes)
 * - PlacementGroupEngine: head-to-head placement groups of four
 * - CumulativeEngine: weekly games ranked by total points
 */

export type { IPlayoffEngine, PlayoffEngineContext, AdvanceResult } from './playoff-engine.interface';
export { BasePlayoffEngine } from './base-playoff.engine';
export { ChampionshipEngine } from './championship.engine';
export { PlacementGroupEngine } from './placement-group.engine';
export { CumulativeEngine } from './cumulative.engine';
export { PlayoffEngineFactory } from './playoff-engine.factory';
export { BracketProgressor } from './bracket-progressor';
