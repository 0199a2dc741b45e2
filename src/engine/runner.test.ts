import { BucketAlreadyOwnedByYou } from '@aws-sdk/client-s3';
import { AlreadyExistsException } from '@aws-sdk/client-glue';
import { runPipeline, type PipelineDeps } from './runner';
import { STEP_ORDER, type PipelineConfig, type StepReport } from './types';
import type { NetworkErrorKind } from './errors';
import { S3BucketProvisioner } from '../provisioners/s3';
import { GlueCatalogProvisioner } from '../provisioners/glue';
import { AthenaQueryConfigurator } from '../provisioners/athena';
import { SportsDataClient } from '../sources/sportsdata';

const config: PipelineConfig = {
  region: 'us-east-1',
  bucketName: 'nba-lake-test',
  databaseName: 'nba_analytics',
  apiKey: 'test-key',
  endpoint: 'https://api.example.test/v3/nba/players',
  fetchTimeoutMs: 1_000,
  bucketReady: { maxAttempts: 3, intervalMs: 0 },
};

const players = [
  { PlayerID: 1, FirstName: 'A', LastName: 'B', Team: 'X', Position: 'G', Points: 10 },
  { PlayerID: 2, FirstName: 'C', LastName: 'D', Team: 'Y', Position: 'F', Points: 20 },
];

const jsonResponse = (body: unknown): Response =>
  new Response(JSON.stringify(body), { status: 200, headers: { 'Content-Type': 'application/json' } });

const awsError = (name: string, message: string): Error => Object.assign(new Error(message), { name });

const createFakes = (body: unknown = players) => {
  const s3 = {
    createBucket: jest.fn().mockResolvedValue({}),
    headBucket: jest.fn().mockResolvedValue({}),
    putObject: jest.fn().mockResolvedValue({}),
  };
  const glue = {
    createDatabase: jest.fn().mockResolvedValue({}),
    createTable: jest.fn().mockResolvedValue({}),
  };
  const athena = {
    startQueryExecution: jest.fn().mockResolvedValue({ QueryExecutionId: 'query-1' }),
  };
  const fetchFn = jest.fn().mockImplementation(() => Promise.resolve(jsonResponse(body)));

  const deps: PipelineDeps = {
    storage: new S3BucketProvisioner(s3),
    catalog: new GlueCatalogProvisioner(glue),
    queryService: new AthenaQueryConfigurator(athena),
    source: new SportsDataClient({ fetchFn }),
  };

  return { s3, glue, athena, fetchFn, deps };
};

const statuses = (steps: StepReport[]) => steps.map((s) => [s.step, s.status]);

describe('runPipeline', () => {
  beforeEach(() => {
    jest.spyOn(console, 'info').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('uploads two records, creates the table once and configures the query service once', async () => {
    const { s3, glue, athena, deps } = createFakes();

    const report = await runPipeline(deps, config);

    expect(s3.putObject).toHaveBeenCalledTimes(1);
    expect(s3.putObject).toHaveBeenCalledWith({
      Bucket: 'nba-lake-test',
      Key: 'raw-data/nba_player_data.jsonl',
      Body: `${JSON.stringify(players[0])}\n${JSON.stringify(players[1])}`,
      ContentType: 'application/x-ndjson',
    });

    expect(glue.createTable).toHaveBeenCalledTimes(1);
    expect(glue.createTable.mock.calls[0][0].TableInput.StorageDescriptor.Columns).toEqual([
      { Name: 'PlayerID', Type: 'int' },
      { Name: 'FirstName', Type: 'string' },
      { Name: 'LastName', Type: 'string' },
      { Name: 'Team', Type: 'string' },
      { Name: 'Position', Type: 'string' },
      { Name: 'Points', Type: 'int' },
    ]);
    expect(glue.createTable.mock.calls[0][0].TableInput.StorageDescriptor.Location).toBe('s3://nba-lake-test/raw-data/');

    expect(athena.startQueryExecution).toHaveBeenCalledTimes(1);
    expect(athena.startQueryExecution).toHaveBeenCalledWith({
      QueryString: 'CREATE DATABASE IF NOT EXISTS nba_analytics',
      QueryExecutionContext: { Database: 'nba_analytics' },
      ResultConfiguration: { OutputLocation: 's3://nba-lake-test/athena-results/' },
    });

    expect(report.steps.map((s) => s.step)).toEqual(STEP_ORDER);
    expect(report.steps.every((s) => s.status === 'succeeded')).toBe(true);
    expect(report.steps.map((s) => s.detail)).toEqual([
      'created',
      'visible after 1 check(s)',
      'created',
      'fetched 2 records',
      'uploaded 2 records to raw-data/nba_player_data.jsonl',
      'created',
      'configured s3://nba-lake-test/athena-results/ (query query-1)',
    ]);
    expect(report).toMatchObject({ fetch: 'fetched', recordCount: 2, failedSteps: [], completed: true });
  });

  it('runs the storage and catalog steps before fetching', async () => {
    const { s3, glue, fetchFn, deps } = createFakes();

    await runPipeline(deps, config);

    const bucketOrder = s3.createBucket.mock.invocationCallOrder[0];
    const readyOrder = s3.headBucket.mock.invocationCallOrder[0];
    const databaseOrder = glue.createDatabase.mock.invocationCallOrder[0];
    const fetchOrder = fetchFn.mock.invocationCallOrder[0];
    const uploadOrder = s3.putObject.mock.invocationCallOrder[0];
    const tableOrder = glue.createTable.mock.invocationCallOrder[0];

    expect([bucketOrder, readyOrder, databaseOrder, fetchOrder, uploadOrder, tableOrder]).toEqual(
      [bucketOrder, readyOrder, databaseOrder, fetchOrder, uploadOrder, tableOrder].sort((a, b) => a - b)
    );
  });

  it('stops after the catalog database when the API returns no records', async () => {
    const { s3, glue, athena, deps } = createFakes([]);

    const report = await runPipeline(deps, config);

    expect(s3.createBucket).toHaveBeenCalledTimes(1);
    expect(glue.createDatabase).toHaveBeenCalledTimes(1);
    expect(s3.putObject).not.toHaveBeenCalled();
    expect(glue.createTable).not.toHaveBeenCalled();
    expect(athena.startQueryExecution).not.toHaveBeenCalled();

    expect(report.fetch).toBe('empty');
    expect(report.steps.slice(4)).toEqual([
      { step: 'upload', status: 'skipped', detail: 'no records fetched' },
      { step: 'table', status: 'skipped', detail: 'no records fetched' },
      { step: 'query-output', status: 'skipped', detail: 'no records fetched' },
    ]);
    expect(report.completed).toBe(true);
  });

  it('treats an empty object body like an empty list', async () => {
    const { s3, glue, athena, deps } = createFakes({});

    const report = await runPipeline(deps, config);

    expect(s3.putObject).toHaveBeenCalledTimes(0);
    expect(glue.createTable).toHaveBeenCalledTimes(0);
    expect(athena.startQueryExecution).toHaveBeenCalledTimes(0);
    expect(report.fetch).toBe('empty');
    expect(report.recordCount).toBe(0);
    expect(report.failedSteps).toEqual([]);
  });

  it.each<[NetworkErrorKind, () => Promise<Response>]>([
    ['http', () => Promise.resolve(new Response('', { status: 503, statusText: 'Service Unavailable' }))],
    [
      'connection',
      () =>
        Promise.reject(
          new TypeError('fetch failed', {
            cause: Object.assign(new Error('getaddrinfo ENOTFOUND api.example.test'), { code: 'ENOTFOUND' }),
          })
        ),
    ],
    ['timeout', () => Promise.reject(awsError('TimeoutError', 'The operation was aborted due to timeout'))],
    ['request', () => Promise.reject(new Error('unexpected end of stream'))],
  ])('continues as if zero records were fetched after a %s failure', async (kind, respond) => {
    const { s3, glue, athena, fetchFn, deps } = createFakes();
    fetchFn.mockImplementation(respond);

    const report = await runPipeline(deps, config);

    expect(s3.putObject).not.toHaveBeenCalled();
    expect(glue.createTable).not.toHaveBeenCalled();
    expect(athena.startQueryExecution).not.toHaveBeenCalled();

    expect(report.fetch).toBe('degraded');
    expect(report.recordCount).toBe(0);
    expect(report.steps[3]).toMatchObject({ step: 'fetch', status: 'failed', error: { category: 'network', kind } });
    expect(report.steps.slice(4).map((s) => s.detail)).toEqual([
      'fetch degraded to no records',
      'fetch degraded to no records',
      'fetch degraded to no records',
    ]);
    expect(report.failedSteps).toEqual(['fetch']);
    expect(report.completed).toBe(true);
  });

  it('keeps going after a failed step by default', async () => {
    const { s3, glue, athena, deps } = createFakes();
    s3.createBucket.mockRejectedValue(awsError('TooManyBuckets', 'You have attempted to create more buckets than allowed'));

    const report = await runPipeline(deps, config);

    expect(glue.createDatabase).toHaveBeenCalledTimes(1);
    expect(s3.putObject).toHaveBeenCalledTimes(1);
    expect(athena.startQueryExecution).toHaveBeenCalledTimes(1);
    expect(report.steps[0]).toMatchObject({ step: 'bucket', status: 'failed', error: { providerCode: 'TooManyBuckets' } });
    expect(report.failedSteps).toEqual(['bucket']);
    expect(report.completed).toBe(true);
  });

  it('skips everything after the first failure under the abort policy', async () => {
    const { s3, glue, fetchFn, deps } = createFakes();
    glue.createDatabase.mockRejectedValue(awsError('AccessDeniedException', 'not authorized to perform glue:CreateDatabase'));

    const report = await runPipeline(deps, config, { failurePolicy: 'abort' });

    expect(fetchFn).not.toHaveBeenCalled();
    expect(s3.putObject).not.toHaveBeenCalled();
    expect(glue.createTable).not.toHaveBeenCalled();
    expect(statuses(report.steps)).toEqual([
      ['bucket', 'succeeded'],
      ['bucket-ready', 'succeeded'],
      ['database', 'failed'],
      ['fetch', 'skipped'],
      ['upload', 'skipped'],
      ['table', 'skipped'],
      ['query-output', 'skipped'],
    ]);
    expect(report.steps[6].detail).toBe('aborted after earlier failure');
    expect(report.fetch).toBe('not-run');
    expect(report.completed).toBe(false);
  });

  it('reports existing resources as success on a second run', async () => {
    const { s3, glue, deps } = createFakes();
    s3.createBucket.mockRejectedValue(new BucketAlreadyOwnedByYou({ $metadata: {}, message: 'already owned by you' }));
    glue.createDatabase.mockRejectedValue(new AlreadyExistsException({ $metadata: {}, message: 'Database already exists.' }));
    glue.createTable.mockRejectedValue(new AlreadyExistsException({ $metadata: {}, message: 'Table already exists.' }));

    const report = await runPipeline(deps, config);

    expect(report.steps[0].detail).toBe('already-owned');
    expect(report.steps[2].detail).toBe('already-exists');
    expect(report.steps[5].detail).toBe('already-exists');
    expect(report.failedSteps).toEqual([]);
  });

  it('fails the readiness step once the poll runs out and still continues', async () => {
    const { s3, glue, deps } = createFakes();
    s3.headBucket.mockRejectedValue(awsError('NotFound', 'Not Found'));

    const report = await runPipeline(deps, config);

    expect(s3.headBucket).toHaveBeenCalledTimes(3);
    expect(report.steps[1]).toMatchObject({ step: 'bucket-ready', status: 'failed', error: { providerCode: 'BucketNotReady' } });
    expect(glue.createDatabase).toHaveBeenCalledTimes(1);
  });

  it('fails the upload without writing when a record cannot be serialized', async () => {
    const { s3, glue, deps } = createFakes();
    jest.spyOn(deps.source, 'fetchDataset').mockResolvedValue({ kind: 'fetched', records: [{ PlayerID: 1n }] });

    const report = await runPipeline(deps, config);

    expect(s3.putObject).not.toHaveBeenCalled();
    expect(report.steps[4]).toMatchObject({
      step: 'upload',
      status: 'failed',
      error: { category: 'serialization', path: 'PlayerID' },
    });
    expect(glue.createTable).toHaveBeenCalledTimes(1);
  });

  it('skips the remaining steps once a stop is requested', async () => {
    const { s3, glue, deps } = createFakes();
    let checks = 0;

    const report = await runPipeline(deps, config, { shouldStop: () => checks++ >= 1 });

    expect(s3.createBucket).toHaveBeenCalledTimes(1);
    expect(s3.headBucket).not.toHaveBeenCalled();
    expect(glue.createDatabase).not.toHaveBeenCalled();
    expect(report.steps.slice(1).every((s) => s.status === 'skipped' && s.detail === 'stop requested')).toBe(true);
    expect(report.completed).toBe(false);
  });

  it('calls the step hook once per step in order', async () => {
    const { deps } = createFakes();
    const onStepComplete = jest.fn();

    await runPipeline(deps, config, { hooks: { onStepComplete } });

    expect(onStepComplete.mock.calls.map(([report]) => report.step)).toEqual(STEP_ORDER);
  });
});
