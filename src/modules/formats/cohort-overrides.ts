import { readFileSync } from 'fs';
import path from 'path';
import { CohortOverride, cohortOverrideFileSchema } from './formats.schemas';
import { ValidationException } from '../../utils/exceptions';

export const DEFAULT_COHORT_OVERRIDES_PATH = path.resolve(__dirname, '../../../data/cohort-overrides.json');

/**
 * Per-season divisional seeding overrides.
 *
 * Some seasons seeded their playoff cohorts by division rather than by
 * overall record; the real first-round matchups are the only trace of that.
 * Those seasons list their cohorts explicitly instead of branching in code.
 */
export class CohortOverrideTable {
  private readonly overrides: ReadonlyMap<number, CohortOverride>;

  constructor(overrides: Record<string, CohortOverride> = {}) {
    this.overrides = new Map(Object.entries(overrides).map(([season, override]) => [parseInt(season, 10), override]));
  }

  static fromJson(data: unknown, source: string = 'inline overrides'): CohortOverrideTable {
    const result = cohortOverrideFileSchema.safeParse(data);
    if (!result.success) {
      const details = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new ValidationException(`Invalid cohort override table (${source}): ${details.join('; ')}`);
    }
    return new CohortOverrideTable(result.data);
  }

  static fromFile(filePath: string = DEFAULT_COHORT_OVERRIDES_PATH): CohortOverrideTable {
    let data: unknown;
    try {
      data = JSON.parse(readFileSync(filePath, 'utf-8'));
    } catch (error) {
      throw new ValidationException(
        `Could not read cohort override table ${filePath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    return CohortOverrideTable.fromJson(data, filePath);
  }

  get(season: number): CohortOverride | null {
    return this.overrides.get(season) ?? null;
  }

  seasons(): number[] {
    return [...this.overrides.keys()].sort((a, b) => a - b);
  }
}
