import { Injectable, Logger } from '@nestjs/common';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { appendFile, mkdir, readFile, stat, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { isFileNotFound } from '../common/errors';
import { HistoryRecord, Listing } from '../tracker/interfaces/listing.interface';

export const HISTORY_COLUMNS = ['keyword', 'title', 'price', 'capturedAt', 'url'];

type HistoryRow = Record<string, string>;

/**
 * Append-only CSV log of every listing ever recorded.
 */
@Injectable()
export class HistoryStore {
  private readonly logger = new Logger(HistoryStore.name);

  /**
   * Appends one row per listing, stamped with `capturedAt`. Listings without
   * a title or with a negative price are dropped. Returns the rows written.
   */
  async append(
    file: string,
    keyword: string,
    listings: readonly Listing[],
    capturedAt: Date = new Date(),
  ): Promise<number> {
    const records = listings
      .filter((listing) => isPersistable(listing))
      .map((listing): HistoryRecord => ({ ...listing, keyword, capturedAt }));

    const dropped = listings.length - records.length;
    if (dropped > 0) {
      this.logger.warn(`Dropped ${dropped} invalid listing(s) for '${keyword}'`);
    }
    if (records.length === 0) return 0;

    const header = await this.needsHeader(file);
    if (header) {
      await mkdir(dirname(file), { recursive: true });
    }
    await appendFile(file, toCsv(records, header), 'utf8');
    return records.length;
  }

  /**
   * Every record in file order. A store that does not exist yet is empty.
   */
  async readAll(file: string): Promise<HistoryRecord[]> {
    let content: string;
    try {
      content = await readFile(file, 'utf8');
    } catch (error) {
      if (isFileNotFound(error)) {
        this.logger.warn(`History file ${file} does not exist yet`);
        return [];
      }
      throw error;
    }

    const rows: string[][] = parse(content, { bom: true, skip_empty_lines: true, relax_column_count: true });
    const [header = [], ...body] = rows;

    const records: HistoryRecord[] = [];
    body.forEach((cells, index) => {
      const row: HistoryRow = Object.fromEntries(header.map((name, column) => [name, cells[column] ?? '']));
      const record = fromRow(row);
      if (record) {
        records.push(record);
      } else {
        this.logger.warn(`Skipping malformed row ${index + 2} of ${file}`);
      }
    });
    return records;
  }

  /**
   * Writes `records` to a fresh CSV file, replacing any previous content.
   */
  async writeRecords(file: string, records: readonly HistoryRecord[]): Promise<void> {
    await mkdir(dirname(file), { recursive: true });
    await writeFile(file, toCsv(records, true), 'utf8');
  }

  private async needsHeader(file: string): Promise<boolean> {
    try {
      return (await stat(file)).size === 0;
    } catch (error) {
      if (isFileNotFound(error)) return true;
      throw error;
    }
  }
}

function isPersistable(listing: Listing): boolean {
  return listing.title.trim().length > 0 && Number.isFinite(listing.price) && listing.price >= 0;
}

function toCsv(records: readonly HistoryRecord[], header: boolean): string {
  return stringify(
    records.map((record) => ({
      keyword: record.keyword,
      title: record.title,
      price: String(record.price),
      capturedAt: record.capturedAt.toISOString(),
      url: record.url ?? '',
    })),
    { header, columns: HISTORY_COLUMNS },
  );
}

function fromRow(row: HistoryRow): HistoryRecord | null {
  const title = row.title?.trim();
  const keyword = row.keyword?.trim() ?? '';
  const price = Number.parseFloat(row.price ?? '');
  const capturedAt = new Date(row.capturedAt ?? '');
  if (!title || !Number.isFinite(price) || price < 0 || Number.isNaN(capturedAt.getTime())) {
    return null;
  }
  return row.url ? { keyword, title, price, capturedAt, url: row.url } : { keyword, title, price, capturedAt };
}
