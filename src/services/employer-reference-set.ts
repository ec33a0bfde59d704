import { mkdir, readFile, stat, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { z } from 'zod';
import { extractEmployerNames, parseReferenceFile } from './reference-file';
import { UnparseableReferenceFileError, errorMessage } from '../utils/errors';
import { lengthsCanMatch, similarityRatio } from '../utils/similarity';
import { collapseWhitespace, stripDecorativeGlyphs } from '../utils/text';
import { logger } from '../utils/logger';

export const DEFAULT_FUZZY_THRESHOLD = 90;

const CORPORATE_SUFFIXES = new Set([
  'inc',
  'incorporated',
  'llc',
  'corp',
  'corporation',
  'co',
  'company',
  'ltd',
  'limited',
  'plc',
  'lp',
  'llp',
]);

/**
 * Comparison form of an employer name
 * Trailing corporate suffixes are removed, but never the last remaining token
 */
export function normalizeEmployerName(name: string): string {
  const cleaned = collapseWhitespace(
    stripDecorativeGlyphs(name).toLowerCase().replace(/[.,'"()]/g, '')
  );
  const tokens = cleaned.split(' ').filter(token => token.length > 0);
  while (tokens.length > 1 && CORPORATE_SUFFIXES.has(tokens[tokens.length - 1])) {
    tokens.pop();
  }
  return tokens.join(' ');
}

export interface ReferenceSetOptions {
  referenceFiles: string[];
  cacheFile: string;
  minCases: number;
  /** Ignore the cache even when it is current */
  forceRebuild?: boolean;
}

export interface EmployerMatch {
  name: string;
  score: number;
}

export type ReferenceSetOrigin = 'cache' | 'files' | 'memory';

const cacheSchema = z.object({
  employers: z.array(z.string()),
  sourceFiles: z.array(z.string()),
});

type ReferenceCache = z.infer<typeof cacheSchema>;

function codePointLength(value: string): number {
  return Array.from(value).length;
}

function sameFiles(a: string[], b: string[]): boolean {
  return a.length === b.length && a.every((file, i) => file === b[i]);
}

async function modifiedAt(filePath: string): Promise<number | null> {
  try {
    return (await stat(filePath)).mtimeMs;
  } catch {
    return null;
  }
}

/**
 * Reads the cache when it still describes the reference files; null means rebuild
 */
async function readCurrentCache(options: ReferenceSetOptions): Promise<ReferenceCache | null> {
  const cacheTime = await modifiedAt(options.cacheFile);
  if (cacheTime === null) return null;

  let cache: ReferenceCache;
  try {
    const parsed = cacheSchema.safeParse(JSON.parse(await readFile(options.cacheFile, 'utf-8')));
    if (!parsed.success) {
      logger.warn(`Sponsor cache ${options.cacheFile} has an unexpected shape, rebuilding`);
      return null;
    }
    cache = parsed.data;
  } catch (error) {
    logger.warn(`Sponsor cache ${options.cacheFile} unreadable, rebuilding`, { error: errorMessage(error) });
    return null;
  }

  if (!sameFiles(cache.sourceFiles, options.referenceFiles)) {
    logger.info('Sponsor cache was built from other reference files, rebuilding');
    return null;
  }

  for (const file of options.referenceFiles) {
    const fileTime = await modifiedAt(file);
    if (fileTime !== null && fileTime > cacheTime) {
      logger.info(`Reference file ${file} changed since the cache was built, rebuilding`);
      return null;
    }
  }

  return cache;
}

/**
 * Employers of one reference file with at least `minCases` approved filings
 */
async function loadSponsors(filePath: string, minCases: number): Promise<Set<string>> {
  let buffer: Buffer;
  try {
    buffer = await readFile(filePath);
  } catch (error) {
    throw new UnparseableReferenceFileError(filePath, errorMessage(error));
  }

  const table = parseReferenceFile(buffer, filePath);
  const names = extractEmployerNames(table);
  if (names === null) {
    logger.warn(`Reference file ${filePath} has no employer column, skipping`, {
      columns: table.header,
    });
    return new Set();
  }

  const counts = new Map<string, number>();
  for (const name of names) {
    const normalized = normalizeEmployerName(name);
    if (!normalized) continue;
    counts.set(normalized, (counts.get(normalized) ?? 0) + 1);
  }

  const sponsors = new Set<string>();
  for (const [name, count] of counts) {
    if (count >= minCases) sponsors.add(name);
  }

  logger.info(`Parsed reference file ${filePath}`, {
    encoding: table.encoding,
    delimiter: JSON.stringify(table.delimiter),
    rows: table.rows.length,
    skippedRows: table.skippedRows,
    sponsors: sponsors.size,
  });

  return sponsors;
}

async function writeCache(cacheFile: string, cache: ReferenceCache): Promise<void> {
  try {
    await mkdir(dirname(cacheFile), { recursive: true });
    await writeFile(cacheFile, `${JSON.stringify(cache, null, 2)}\n`, 'utf-8');
    logger.info(`Cached ${cache.employers.length} employers to ${cacheFile}`);
  } catch (error) {
    logger.error(`Could not write sponsor cache ${cacheFile}`, error);
  }
}

/**
 * Set of employers known to sponsor work visas
 * Read-only once built; queries take any display-form name
 */
export class EmployerReferenceSet {
  private readonly members: Set<string>;
  private readonly sorted: string[];
  private readonly byLength = new Map<number, string[]>();

  private constructor(names: Iterable<string>, readonly origin: ReferenceSetOrigin) {
    this.members = new Set(names);
    this.sorted = [...this.members].sort();

    for (const member of this.sorted) {
      const length = codePointLength(member);
      const bucket = this.byLength.get(length);
      if (bucket) {
        bucket.push(member);
      } else {
        this.byLength.set(length, [member]);
      }
    }
  }

  /**
   * Builds from already normalized names
   */
  static fromNormalized(names: Iterable<string>): EmployerReferenceSet {
    return new EmployerReferenceSet(names, 'memory');
  }

  /**
   * Loads the cache when current, otherwise parses every reference file and rewrites the cache
   * Rejects with UnparseableReferenceFileError when a file cannot be read or parsed
   */
  static async build(options: ReferenceSetOptions): Promise<EmployerReferenceSet> {
    if (!options.forceRebuild) {
      const cache = await readCurrentCache(options);
      if (cache) {
        logger.info(`Loaded ${cache.employers.length} employers from cache ${options.cacheFile}`);
        return new EmployerReferenceSet(cache.employers, 'cache');
      }
    }

    const employers = new Set<string>();
    for (const file of options.referenceFiles) {
      for (const name of await loadSponsors(file, options.minCases)) {
        employers.add(name);
      }
    }

    const set = new EmployerReferenceSet(employers, 'files');
    await writeCache(options.cacheFile, {
      employers: set.toArray(),
      sourceFiles: [...options.referenceFiles],
    });
    return set;
  }

  get size(): number {
    return this.members.size;
  }

  /**
   * Sorted normalized members
   */
  toArray(): string[] {
    return [...this.sorted];
  }

  hasExact(name: string): boolean {
    const normalized = normalizeEmployerName(name);
    return normalized.length > 0 && this.members.has(normalized);
  }

  matchesApprox(name: string, threshold: number = DEFAULT_FUZZY_THRESHOLD): boolean {
    const normalized = normalizeEmployerName(name);
    if (!normalized || this.members.size === 0) return false;
    if (this.members.has(normalized)) return true;

    const length = codePointLength(normalized);
    for (const [memberLength, bucket] of this.byLength) {
      if (!lengthsCanMatch(length, memberLength, threshold)) continue;
      if (bucket.some(member => similarityRatio(normalized, member) >= threshold)) {
        return true;
      }
    }
    return false;
  }

  /**
   * Closest member over the whole set; ties go to the first in sorted order
   */
  bestMatch(name: string): EmployerMatch | null {
    const normalized = normalizeEmployerName(name);
    if (!normalized || this.members.size === 0) return null;

    let best: EmployerMatch | null = null;
    for (const member of this.sorted) {
      const score = similarityRatio(normalized, member);
      if (!best || score > best.score) {
        best = { name: member, score };
      }
    }
    return best;
  }
}
