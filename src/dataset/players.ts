/**
 * NBA player dataset: where it lands in S3 and how Glue describes it.
 * The upload key and the table location are both derived from one DatasetLayout.
 */

export const TABLE_NAME = 'nba_players';
export const RAW_DATA_PREFIX = 'raw-data/';
export const DATA_FILE_NAME = 'nba_player_data.jsonl';
export const QUERY_RESULTS_PREFIX = 'athena-results/';

export const DATABASE_DESCRIPTION = 'Glue database for NBA sports analytics.';

export type ColumnType = 'int' | 'bigint' | 'double' | 'string' | 'boolean';

export type ColumnDefinition = {
  name: string;
  type: ColumnType;
};

export const COLUMNS: ReadonlyArray<ColumnDefinition> = [
  { name: 'PlayerID', type: 'int' },
  { name: 'FirstName', type: 'string' },
  { name: 'LastName', type: 'string' },
  { name: 'Team', type: 'string' },
  { name: 'Position', type: 'string' },
  { name: 'Points', type: 'int' },
];

export const JSON_LINES_FORMAT = {
  inputFormat: 'org.apache.hadoop.mapred.TextInputFormat',
  outputFormat: 'org.apache.hadoop.hive.ql.io.HiveIgnoreKeyTextOutputFormat',
  serializationLibrary: 'org.openx.data.jsonserde.JsonSerDe',
  classification: 'json',
} as const;

export type StorageLocation = {
  bucket: string;
  key: string;
};

export type DatasetLayout = {
  /** Where the serialized batch is written */
  object: StorageLocation;
  /** s3:// URI of the prefix the catalog table reads from */
  tableLocation: string;
  /** s3:// URI where the query service writes results */
  queryOutputLocation: string;
};

export type CatalogTableDefinition = {
  name: string;
  columns: ReadonlyArray<ColumnDefinition>;
  location: string;
  inputFormat: string;
  outputFormat: string;
  serializationLibrary: string;
  classification: string;
};

export const toS3Uri = (bucket: string, key: string): string => `s3://${bucket}/${key}`;

export const buildLayout = (bucket: string): DatasetLayout => ({
  object: { bucket, key: `${RAW_DATA_PREFIX}${DATA_FILE_NAME}` },
  tableLocation: toS3Uri(bucket, RAW_DATA_PREFIX),
  queryOutputLocation: toS3Uri(bucket, QUERY_RESULTS_PREFIX),
});

/** True when the uploaded object sits directly under the prefix the table reads */
export const isObjectInTableLocation = (layout: DatasetLayout): boolean => {
  const objectUri = toS3Uri(layout.object.bucket, layout.object.key);
  if (!layout.tableLocation.endsWith('/') || !objectUri.startsWith(layout.tableLocation)) {
    return false;
  }
  return !objectUri.slice(layout.tableLocation.length).includes('/');
};

export const buildTableDefinition = (layout: DatasetLayout): CatalogTableDefinition => ({
  name: TABLE_NAME,
  columns: COLUMNS,
  location: layout.tableLocation,
  inputFormat: JSON_LINES_FORMAT.inputFormat,
  outputFormat: JSON_LINES_FORMAT.outputFormat,
  serializationLibrary: JSON_LINES_FORMAT.serializationLibrary,
  classification: JSON_LINES_FORMAT.classification,
});
