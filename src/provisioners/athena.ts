import type { Athena } from '@aws-sdk/client-athena';
import { AuthError, ProviderError, classifyAwsError, fail, ok, type Result } from '../engine/errors';

export type AthenaQueryClient = Pick<Athena, 'startQueryExecution'>;

const DATABASE_NAME_PATTERN = /^[a-z0-9_]+$/;

export type QueryOutputOutcome = {
  queryExecutionId?: string;
};

/**
 * Registers the default result location with Athena by running
 * CREATE DATABASE IF NOT EXISTS against it. The statement is idempotent on the Athena side.
 */
export class AthenaQueryConfigurator {
  private readonly client: AthenaQueryClient;

  constructor(client: AthenaQueryClient) {
    this.client = client;
  }

  async ensureOutputLocation(
    database: string,
    outputLocation: string
  ): Promise<Result<QueryOutputOutcome, AuthError | ProviderError>> {
    // The name is interpolated into the statement
    if (!DATABASE_NAME_PATTERN.test(database)) {
      return fail(
        new ProviderError('StartQueryExecution', 'InvalidDatabaseName', `Invalid Athena database name "${database}"`)
      );
    }

    try {
      const response = await this.client.startQueryExecution({
        QueryString: `CREATE DATABASE IF NOT EXISTS ${database}`,
        QueryExecutionContext: { Database: database },
        ResultConfiguration: { OutputLocation: outputLocation },
      });
      return ok({ queryExecutionId: response.QueryExecutionId });
    } catch (err) {
      return fail(classifyAwsError('StartQueryExecution', err));
    }
  }
}
