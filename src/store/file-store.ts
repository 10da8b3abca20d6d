import { readFileSync, writeFileSync, existsSync, mkdirSync, renameSync } from 'fs';
import { join, dirname } from 'path';
import { homedir } from 'os';
import { parseReview } from '../review-validation.js';
import type { Review, ReviewPersistence } from '../review-types.js';

/**
 * Get bookgossip data directory from environment or default
 */
export function getDataDir(): string {
  return process.env.BOOKGOSSIP_DATA_DIR || join(homedir(), '.bookgossip');
}

/**
 * On-disk layout of reviews.json
 */
interface ReviewFile {
  version: string;
  reviews: { [id: string]: Review };
}

const FILE_VERSION = '1.0';

/**
 * JSON file backing for a ReviewStore
 *
 * The whole store is rewritten on every save (through a temp file and a
 * rename, so a crash mid-write leaves the previous snapshot intact).
 */
export class JsonFileReviewPersistence implements ReviewPersistence {
  readonly path: string;

  constructor(customPath?: string) {
    this.path = customPath || join(getDataDir(), 'reviews.json');
  }

  async loadAll(): Promise<Map<string, Review>> {
    const reviews = new Map<string, Review>();

    if (!existsSync(this.path)) {
      console.log(`[FileStore] No review file at ${this.path}, starting empty`);
      return reviews;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.path, 'utf-8'));
    } catch (error) {
      console.warn(`[FileStore] Failed to read ${this.path}, starting fresh:`, error);
      return reviews;
    }

    const records: unknown = raw !== null && typeof raw === 'object' ? Reflect.get(raw, 'reviews') : undefined;
    if (records === null || typeof records !== 'object') {
      console.warn(`[FileStore] ${this.path} has no reviews section, starting fresh`);
      return reviews;
    }

    let skipped = 0;
    for (const value of Object.values(records)) {
      const review = parseReview(value);
      if (review) {
        reviews.set(review.id, review);
      } else {
        skipped++;
      }
    }

    if (skipped > 0) {
      console.warn(`[FileStore] ⚠️ Skipped ${skipped} invalid record(s) in ${this.path}`);
    }
    console.log(`[FileStore] ✅ Loaded ${reviews.size} review(s) from ${this.path}`);
    return reviews;
  }

  async saveAll(reviews: ReadonlyMap<string, Review>): Promise<void> {
    const data: ReviewFile = { version: FILE_VERSION, reviews: {} };
    for (const [id, review] of reviews) {
      data.reviews[id] = review;
    }

    const tmpPath = `${this.path}.tmp`;
    try {
      this.ensureDir();
      writeFileSync(tmpPath, JSON.stringify(data, null, 2), 'utf-8');
      renameSync(tmpPath, this.path);
    } catch (error) {
      console.error(`[FileStore] ❌ Failed to save to ${this.path}:`, error);
      throw error;
    }
  }

  private ensureDir(): void {
    const dir = dirname(this.path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }
}
