// Shared types for script files

/** A CSV row as csv-parse returns it with `columns: true`. */
export type CsvRecord = Record<string, string>;

export type FileChange = {
  file: string;
  removedLines: number;
};

export type BatchSummary = {
  pais: string;
  day: string;
  entries: number;
  rows: number;
  written: string[];
};
