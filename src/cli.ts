#!/usr/bin/env node
import { parseArgs } from 'node:util';
import { S3 } from '@aws-sdk/client-s3';
import { Glue } from '@aws-sdk/client-glue';
import { Athena } from '@aws-sdk/client-athena';
import { loadConfig } from './engine/config';
import { log } from './engine/logger';
import { runPipeline, type PipelineDeps } from './engine/runner';
import type { FailurePolicy, PipelineConfig, RunReport } from './engine/types';
import { S3BucketProvisioner } from './provisioners/s3';
import { GlueCatalogProvisioner } from './provisioners/glue';
import { AthenaQueryConfigurator } from './provisioners/athena';
import { SportsDataClient } from './sources/sportsdata';

import 'dotenv/config';

const { values, positionals } = parseArgs({
  allowPositionals: true,
  options: {
    'failure-policy': { type: 'string', default: 'continue' },
    json: { type: 'boolean', default: false },
    strict: { type: 'boolean', default: false },
  },
});

const command = positionals[0] ?? 'run';

const parseFailurePolicy = (raw: unknown): FailurePolicy => {
  if (raw === 'continue' || raw === 'abort') return raw;
  console.error(`Error: --failure-policy must be "continue" or "abort", got "${String(raw)}"`);
  process.exit(1);
};

const buildDeps = (config: PipelineConfig): PipelineDeps => ({
  storage: new S3BucketProvisioner(new S3({ region: config.region })),
  catalog: new GlueCatalogProvisioner(new Glue({ region: config.region })),
  queryService: new AthenaQueryConfigurator(new Athena({ region: config.region })),
  source: new SportsDataClient({ timeoutMs: config.fetchTimeoutMs }),
});

// Errors are carried as class instances; flatten them for JSON output
const toJson = (report: RunReport): string =>
  JSON.stringify(
    {
      ...report,
      steps: report.steps.map(({ error, ...step }) =>
        error ? { ...step, error: { name: error.name, message: error.message } } : step
      ),
    },
    null,
    2
  );

const runCommand = async (): Promise<void> => {
  const failurePolicy = parseFailurePolicy(values['failure-policy']);
  const config = loadConfig(process.env);

  const abortController = new AbortController();
  const shouldStop = () => abortController.signal.aborted;

  const onSignal = () => {
    if (abortController.signal.aborted) return;
    abortController.abort();
    console.info('\nGraceful shutdown requested, waiting for current step to finish...');
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  const report = await runPipeline(buildDeps(config), config, { failurePolicy, shouldStop });

  process.off('SIGINT', onSignal);
  process.off('SIGTERM', onSignal);

  if (values.json === true) {
    console.info(toJson(report));
  }

  if (values.strict === true && report.failedSteps.length > 0) {
    process.exitCode = 1;
  }
};

const printUsage = (): void => {
  console.info(`
Usage: tsx src/cli.ts [command] [options]

Commands:
  run      Provision the data lake and load NBA player data (default)
  help     Show this message

Options:
  --failure-policy <p>   continue (default) or abort on the first failed step
  --json                 Print the run report as JSON
  --strict               Exit with code 1 when any step failed

Environment:
  AWS_REGION                 AWS region (default: us-east-1)
  S3_BUCKET_NAME             Bucket for raw data and query results
  GLUE_DATABASE_NAME         Glue catalog database
  SPORTS_DATA_API_KEY        SportsData.io subscription key
  NBA_ENDPOINT               Player dataset URL
  FETCH_TIMEOUT_MS           Request timeout (default: 30000)
  BUCKET_READY_MAX_ATTEMPTS  Bucket readiness checks (default: 10)
  BUCKET_READY_INTERVAL_MS   Delay between checks (default: 1000)
`);
};

const main = async (): Promise<void> => {
  switch (command) {
    case 'run':
      await runCommand();
      break;
    case 'help':
      printUsage();
      break;
    default:
      printUsage();
      process.exit(1);
  }
};

main().catch((err) => {
  log.error(`Fatal error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
