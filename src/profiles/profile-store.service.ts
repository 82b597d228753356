import { Inject, Injectable, Logger } from '@nestjs/common';
import csvParser from 'csv-parser';
import { createObjectCsvStringifier } from 'csv-writer';
import * as fs from 'fs';
import * as path from 'path';
import { SCRAPER_CONFIG, ScraperConfig } from '../config/scraper.config';
import { ProfileTableError } from '../errors/scraper.errors';
import {
  COLUMN_FIELDS,
  PROFILE_COLUMNS,
  ProfileRecord,
  ProfileTable,
} from './profile-table';

interface CsvContents {
  headers: string[];
  rows: Record<string, string>[];
}

function readCsv(filePath: string): Promise<CsvContents> {
  return new Promise((resolve, reject) => {
    let headers: string[] = [];
    const rows: Record<string, string>[] = [];

    fs.createReadStream(filePath)
      .on('error', reject)
      .pipe(
        csvParser({
          mapHeaders: ({ header }) => header.trim().replace(/^\uFEFF/, ''), // handle BOM
        }),
      )
      .on('headers', (names: string[]) => {
        headers = names;
      })
      .on('data', (row: Record<string, string>) => rows.push(row))
      .on('end', () => resolve({ headers, rows }))
      .on('error', reject);
  });
}

/**
 * Reads and rewrites the CSV file that holds every scraped profile.
 * The file is always rewritten whole; there are no partial updates.
 */
@Injectable()
export class ProfileStoreService {
  private readonly logger = new Logger(ProfileStoreService.name);

  constructor(@Inject(SCRAPER_CONFIG) private readonly config: ScraperConfig) {}

  async load(filePath: string = this.config.outputFile): Promise<ProfileTable> {
    if (!fs.existsSync(filePath)) {
      this.logger.warn(`No existing data at ${filePath}, starting empty`);
      return ProfileTable.empty();
    }

    const { headers, rows } = await readCsv(filePath);
    if (!headers.includes('URL')) {
      throw new ProfileTableError(`${filePath} has no URL column`);
    }

    const records = rows.map(
      (row): ProfileRecord => ({
        url: row['URL'] ?? '',
        winemaker: row['Winemaker'] ?? '',
        translatedInformation: row['Translated Information'] ?? '',
        information: row['Information'] ?? '',
      }),
    );

    this.logger.log(`Loaded ${records.length} existing profiles from ${filePath}`);
    return new ProfileTable(headers, records);
  }

  async save(
    table: ProfileTable,
    filePath: string = this.config.outputFile,
  ): Promise<void> {
    fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });

    const stringifier = createObjectCsvStringifier({
      header: PROFILE_COLUMNS.map((title) => ({
        id: COLUMN_FIELDS[title],
        title,
      })),
    });

    // stringifyRecords([]) still emits a record delimiter, which reads back as a blank row
    const body =
      table.size > 0
        ? stringifier.stringifyRecords(
            table.records.map((record) => ({
              url: record.url,
              winemaker: record.winemaker,
              translatedInformation: record.translatedInformation,
              information: record.information,
            })),
          )
        : '';

    await fs.promises.writeFile(
      filePath,
      `${stringifier.getHeaderString() ?? ''}${body}`,
      'utf-8',
    );
    this.logger.log(`Saved ${table.size} profiles to ${filePath}`);
  }
}
