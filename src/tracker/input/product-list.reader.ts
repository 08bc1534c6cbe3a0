import { Injectable, Logger } from '@nestjs/common';
import { parse } from 'csv-parse/sync';
import { readFile } from 'node:fs/promises';
import { getErrorMessage, isFileNotFound } from '../../common/errors';
import { InputFileError } from '../errors/tracker.errors';
import { ProductQuery } from '../interfaces/listing.interface';

const KEYWORD_COLUMNS = ['keyword', 'product'];
const LIMIT_COLUMN = 'limit';

/**
 * Reads the list of tracked products from a CSV file with a `keyword` (or
 * `product`) column and an optional per-row `limit` column.
 */
@Injectable()
export class ProductListReader {
  private readonly logger = new Logger(ProductListReader.name);

  async read(path: string, defaultLimit: number): Promise<ProductQuery[]> {
    let content: string;
    try {
      content = await readFile(path, 'utf8');
    } catch (error) {
      if (isFileNotFound(error)) {
        throw new InputFileError(`Product list not found at ${path}`, path);
      }
      throw new InputFileError(`Cannot read product list ${path}: ${getErrorMessage(error)}`, path);
    }

    let rows: string[][];
    try {
      rows = parse(content, { bom: true, skip_empty_lines: true, trim: true, relax_column_count: true });
    } catch (error) {
      throw new InputFileError(`Product list ${path} is not valid CSV: ${getErrorMessage(error)}`, path);
    }

    const [header, ...records] = rows;
    const columns = (header ?? []).map((name) => name.toLowerCase());
    const keywordIndex = columns.findIndex((name) => KEYWORD_COLUMNS.includes(name));
    if (keywordIndex < 0) {
      throw new InputFileError(`Product list ${path} needs a 'keyword' or 'product' column`, path);
    }
    this.logger.debug(`Using column '${header[keywordIndex]}' as the keyword source`);
    const limitIndex = columns.indexOf(LIMIT_COLUMN);

    const queries: ProductQuery[] = [];
    for (const record of records) {
      const keyword = record[keywordIndex]?.trim();
      if (!keyword) continue;
      queries.push({
        keyword,
        resultLimit: parseLimit(limitIndex < 0 ? undefined : record[limitIndex]) ?? defaultLimit,
      });
    }
    return queries;
  }
}

function parseLimit(value: string | undefined): number | undefined {
  if (!value || !/^\d+$/.test(value)) return undefined;
  const limit = Number.parseInt(value, 10);
  return limit > 0 ? limit : undefined;
}
