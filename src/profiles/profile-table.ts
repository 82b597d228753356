export interface ProfileRecord {
  url: string;
  winemaker: string;
  translatedInformation: string;
  information: string;
}

export const PROFILE_COLUMNS = [
  'URL',
  'Winemaker',
  'Translated Information',
  'Information',
] as const;

export type ProfileColumn = (typeof PROFILE_COLUMNS)[number];

/** Columns of a table that has never held a translated record. */
export const PRE_TRANSLATION_COLUMNS: readonly ProfileColumn[] = [
  'URL',
  'Winemaker',
  'Information',
];

export const COLUMN_FIELDS: Record<ProfileColumn, keyof ProfileRecord> = {
  URL: 'url',
  Winemaker: 'winemaker',
  'Translated Information': 'translatedInformation',
  Information: 'information',
};

/**
 * Ordered, append-only collection of profile records keyed by URL.
 * Membership is an exact match on the URL string.
 */
export class ProfileTable {
  private readonly rows: ProfileRecord[] = [];
  private readonly urls = new Set<string>();
  private readonly columnNames: string[];

  constructor(
    columns: readonly string[] = PRE_TRANSLATION_COLUMNS,
    records: readonly ProfileRecord[] = [],
  ) {
    this.columnNames = [...columns];
    // rows already on disk are kept as-is, duplicates included
    for (const record of records) {
      this.rows.push({ ...record });
      this.urls.add(record.url);
    }
  }

  static empty(): ProfileTable {
    return new ProfileTable();
  }

  get columns(): readonly string[] {
    return this.columnNames;
  }

  get records(): readonly ProfileRecord[] {
    return this.rows;
  }

  get size(): number {
    return this.rows.length;
  }

  has(url: string): boolean {
    return this.urls.has(url);
  }

  /** Returns false, leaving the table untouched, when the URL is already present. */
  append(record: ProfileRecord): boolean {
    if (this.has(record.url)) return false;

    this.rows.push({ ...record });
    this.urls.add(record.url);
    for (const column of PROFILE_COLUMNS) {
      if (!this.columnNames.includes(column)) {
        this.columnNames.push(column);
      }
    }
    return true;
  }
}
