import { readFileSync } from 'fs';
import path from 'path';
import { BracketFormat, coversSeason, formatSeasonRanges } from './format.model';
import { formatCatalogFileSchema, formatFromEntry } from './formats.schemas';
import { FormatNotFoundError, ValidationException } from '../../utils/exceptions';

export const DEFAULT_FORMAT_CATALOG_PATH = path.resolve(__dirname, '../../../data/bracket-formats.json');

/**
 * Season → BracketFormat lookup.
 *
 * Read-only after construction, so one instance can be shared by concurrent
 * season resolutions.
 */
export class FormatCatalog {
  private readonly formats: readonly BracketFormat[];

  constructor(formats: BracketFormat[]) {
    assertNoOverlap(formats);
    this.formats = formats;
  }

  /**
   * Parse and validate catalog JSON (`{ "formats": [...] }`).
   */
  static fromJson(data: unknown, source: string = 'inline catalog'): FormatCatalog {
    const result = formatCatalogFileSchema.safeParse(data);
    if (!result.success) {
      const details = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new ValidationException(`Invalid bracket format catalog (${source}): ${details.join('; ')}`);
    }
    return new FormatCatalog(result.data.formats.map(formatFromEntry));
  }

  static fromFile(filePath: string = DEFAULT_FORMAT_CATALOG_PATH): FormatCatalog {
    let data: unknown;
    try {
      data = JSON.parse(readFileSync(filePath, 'utf-8'));
    } catch (error) {
      throw new ValidationException(
        `Could not read bracket format catalog ${filePath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    return FormatCatalog.fromJson(data, filePath);
  }

  getFormat(season: number): BracketFormat {
    const format = this.formats.find((candidate) => candidate.seasons.some((range) => coversSeason(range, season)));
    if (!format) {
      throw new FormatNotFoundError(season);
    }
    return format;
  }

  listFormats(): readonly BracketFormat[] {
    return this.formats;
  }
}

function rangesOverlap(a: BracketFormat['seasons'][number], b: BracketFormat['seasons'][number]): boolean {
  const aEnd = a.to ?? Number.POSITIVE_INFINITY;
  const bEnd = b.to ?? Number.POSITIVE_INFINITY;
  return a.from <= bEnd && b.from <= aEnd;
}

function assertNoOverlap(formats: BracketFormat[]): void {
  const ranges = formats.flatMap((format) => format.seasons.map((range) => ({ format, range })));
  for (let i = 0; i < ranges.length; i++) {
    for (let j = i + 1; j < ranges.length; j++) {
      if (rangesOverlap(ranges[i].range, ranges[j].range)) {
        throw new ValidationException(
          `Bracket formats "${ranges[i].format.name}" (${formatSeasonRanges(ranges[i].format)}) and ` +
            `"${ranges[j].format.name}" (${formatSeasonRanges(ranges[j].format)}) cover the same season`
        );
      }
    }
  }
}
