/**
 * Per-team weekly scores from the lineup layer.
 */
export interface TeamScoreLookup {
  /**
   * Fantasy points of the team's starting lineup for one week. Bench points
   * are never included.
   */
  getStarterScore(teamId: string, season: number, week: number): Promise<number>;
}
