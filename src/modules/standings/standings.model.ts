/**
 * Regular-season records and final standings
 */

/**
 * A team's regular-season record.
 * Invariant: wins + losses + ties equals the regular-season games the team appears in.
 */
export interface TeamRecord {
  teamId: string;
  teamName: string;
  wins: number;
  losses: number;
  ties: number;
  pointsFor: number;
  pointsAgainst: number;
}

/**
 * A team's final place for a season. Across one season, place runs 1..N
 * with no gaps or repeats.
 */
export interface Standing {
  place: number;
  label: string;
  teamId: string;
  teamName: string;
  /** Sum of weekBreakdown */
  points: number;
  /** Postseason points by week, for the games that decided the place */
  weekBreakdown: Record<number, number>;
}

export function emptyRecord(teamId: string, teamName: string): TeamRecord {
  return { teamId, teamName, wins: 0, losses: 0, ties: 0, pointsFor: 0, pointsAgainst: 0 };
}

export function standingToResponse(standing: Standing) {
  return {
    place: standing.place,
    label: standing.label,
    team_id: standing.teamId,
    team_name: standing.teamName,
    points: standing.points,
    week_breakdown: Object.fromEntries(
      Object.entries(standing.weekBreakdown).map(([week, points]) => [`week_${week}`, points])
    ),
  };
}
