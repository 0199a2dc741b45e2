import type { S3BucketProvisioner } from '../provisioners/s3';
import type { GlueCatalogProvisioner } from '../provisioners/glue';
import type { AthenaQueryConfigurator } from '../provisioners/athena';
import type { SportsDataClient } from '../sources/sportsdata';
import { buildLayout, buildTableDefinition, isObjectInTableLocation, toS3Uri } from '../dataset/players';
import { PipelineError, ProviderError, fail, ok, type Result } from './errors';
import { log, formatAwsError } from './logger';
import { toLineDelimited, type DatasetRecord } from './transcode';
import {
  STEP_ORDER,
  type FetchStatus,
  type PipelineConfig,
  type PipelineOptions,
  type RunReport,
  type StepName,
  type StepReport,
} from './types';

export type PipelineDeps = {
  storage: S3BucketProvisioner;
  catalog: GlueCatalogProvisioner;
  queryService: AthenaQueryConfigurator;
  source: SportsDataClient;
};

/** A step action resolves to a short detail string on success */
type StepResult = Result<string, PipelineError>;

type RunState = {
  halted?: 'aborted' | 'stopped';
  fetch: FetchStatus | 'not-run';
  records: DatasetRecord[];
};

const toPipelineError = (step: StepName, err: unknown): PipelineError => {
  if (err instanceof PipelineError) return err;
  const detail = err instanceof Error ? err.message : String(err);
  return new ProviderError(step, 'UnexpectedError', `Unexpected failure in ${step}: ${detail}`, { cause: err });
};

const logStep = (report: StepReport): void => {
  if (report.status === 'failed' && report.error) {
    const cause =
      report.error instanceof ProviderError && report.error.cause ? `\n${formatAwsError(report.error.cause)}` : '';
    log.stepError(report.step, report.error.name, `${report.error.message}${cause}`);
    return;
  }
  if (report.status === 'skipped') {
    log.step(report.step, `skipped${report.detail ? ` (${report.detail})` : ''}`);
    return;
  }
  log.step(report.step, report.detail ?? 'done');
};

/**
 * Provision the data lake and load the player dataset.
 *
 * Steps run strictly in order: bucket, bucket readiness, catalog database, fetch, then,
 * only when records were fetched, upload, table and query output location.
 * A failed step never throws out of here; the failure policy decides whether later steps run.
 */
export const runPipeline = async (
  deps: PipelineDeps,
  config: PipelineConfig,
  options: PipelineOptions = {}
): Promise<RunReport> => {
  const startTime = Date.now();
  const failurePolicy = options.failurePolicy ?? 'continue';
  const shouldStop = options.shouldStop ?? (() => false);
  const layout = buildLayout(config.bucketName);

  const steps: StepReport[] = [];
  const state: RunState = { fetch: 'not-run', records: [] };

  const settle = (report: StepReport): void => {
    steps.push(report);
    logStep(report);
    options.hooks?.onStepComplete?.(report);
  };

  const skip = (step: StepName, detail: string): void => settle({ step, status: 'skipped', detail });

  const runStep = async (step: StepName, action: () => Promise<StepResult>): Promise<void> => {
    if (!state.halted && shouldStop()) {
      state.halted = 'stopped';
      log.info('Graceful shutdown: skipping remaining steps');
    }
    if (state.halted) {
      skip(step, state.halted === 'aborted' ? 'aborted after earlier failure' : 'stop requested');
      return;
    }

    const result = await action().catch((err: unknown) => fail(toPipelineError(step, err)));

    if (result.ok) {
      settle({ step, status: 'succeeded', detail: result.value });
      return;
    }

    settle({ step, status: 'failed', error: result.error });
    if (failurePolicy === 'abort') {
      state.halted = 'aborted';
    }
  };

  log.pipeline.start({
    region: config.region,
    bucketName: config.bucketName,
    databaseName: config.databaseName,
    failurePolicy,
  });

  // 1. Storage
  await runStep('bucket', async () => {
    const result = await deps.storage.ensureBucket(config.bucketName, config.region);
    return result.ok ? ok(result.value) : result;
  });

  await runStep('bucket-ready', async () => {
    const result = await deps.storage.waitForBucket(config.bucketName, config.bucketReady);
    return result.ok ? ok(`visible after ${result.value} check(s)`) : result;
  });

  // 2. Catalog database
  await runStep('database', async () => {
    const result = await deps.catalog.ensureDatabase(config.databaseName);
    return result.ok ? ok(result.value) : result;
  });

  // 3. Fetch
  await runStep('fetch', async () => {
    const outcome = await deps.source.fetchDataset(config.endpoint, config.apiKey);
    state.fetch = outcome.kind;
    switch (outcome.kind) {
      case 'fetched':
        state.records = outcome.records;
        return ok(`fetched ${outcome.records.length} records`);
      case 'empty':
        return ok('no records returned');
      case 'degraded':
        log.warn('Fetch failed; continuing as if no records were returned');
        return fail(outcome.error);
    }
  });

  // 4. Nothing to catalog without data
  if (!state.halted && state.records.length === 0) {
    const reason = state.fetch === 'degraded' ? 'fetch degraded to no records' : 'no records fetched';
    for (const step of STEP_ORDER.slice(STEP_ORDER.indexOf('upload'))) {
      skip(step, reason);
    }
  } else {
    await runStep('upload', async () => {
      if (!isObjectInTableLocation(layout)) {
        return fail(
          new PipelineError(
            `Object ${toS3Uri(layout.object.bucket, layout.object.key)} is outside table location ${layout.tableLocation}`
          )
        );
      }

      const body = toLineDelimited(state.records);
      if (!body.ok) return body;

      const result = await deps.storage.putObject(layout.object, body.value);
      return result.ok ? ok(`uploaded ${state.records.length} records to ${layout.object.key}`) : result;
    });

    await runStep('table', async () => {
      const result = await deps.catalog.ensureTable(config.databaseName, buildTableDefinition(layout));
      return result.ok ? ok(result.value) : result;
    });

    await runStep('query-output', async () => {
      const result = await deps.queryService.ensureOutputLocation(config.databaseName, layout.queryOutputLocation);
      if (!result.ok) return result;
      const id = result.value.queryExecutionId ? ` (query ${result.value.queryExecutionId})` : '';
      return ok(`configured ${layout.queryOutputLocation}${id}`);
    });
  }

  const report: RunReport = {
    steps,
    fetch: state.fetch,
    recordCount: state.records.length,
    failedSteps: steps.filter((s) => s.status === 'failed').map((s) => s.step),
    completed: state.halted === undefined,
    elapsedMs: Date.now() - startTime,
  };

  log.pipeline.summary(report);
  log.success('Data lake setup complete.');

  return report;
};
