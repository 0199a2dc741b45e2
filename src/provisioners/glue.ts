import { AlreadyExistsException, type CreateTableCommandInput, type Glue } from '@aws-sdk/client-glue';
import { AuthError, ProviderError, classifyAwsError, fail, ok, type Result } from '../engine/errors';
import { DATABASE_DESCRIPTION, type CatalogTableDefinition } from '../dataset/players';

export type GlueCatalogClient = Pick<Glue, 'createDatabase' | 'createTable'>;

export type CatalogOutcome = 'created' | 'already-exists';

const toTableInput = (database: string, table: CatalogTableDefinition): CreateTableCommandInput => ({
  DatabaseName: database,
  TableInput: {
    Name: table.name,
    StorageDescriptor: {
      Columns: table.columns.map((column) => ({ Name: column.name, Type: column.type })),
      Location: table.location,
      InputFormat: table.inputFormat,
      OutputFormat: table.outputFormat,
      SerdeInfo: {
        SerializationLibrary: table.serializationLibrary,
      },
    },
    TableType: 'EXTERNAL_TABLE',
    Parameters: {
      classification: table.classification,
    },
  },
});

/**
 * Catalog provisioner backed by the Glue Data Catalog.
 * Both operations are idempotent: an existing database or table is reported, not raised.
 */
export class GlueCatalogProvisioner {
  private readonly client: GlueCatalogClient;

  constructor(client: GlueCatalogClient) {
    this.client = client;
  }

  async ensureDatabase(name: string): Promise<Result<CatalogOutcome, AuthError | ProviderError>> {
    try {
      await this.client.createDatabase({
        DatabaseInput: {
          Name: name,
          Description: DATABASE_DESCRIPTION,
        },
      });
      return ok('created');
    } catch (err) {
      if (err instanceof AlreadyExistsException) {
        return ok('already-exists');
      }
      return fail(classifyAwsError('CreateDatabase', err));
    }
  }

  /** The database must already exist; callers order the steps accordingly. */
  async ensureTable(
    database: string,
    table: CatalogTableDefinition
  ): Promise<Result<CatalogOutcome, AuthError | ProviderError>> {
    try {
      await this.client.createTable(toTableInput(database, table));
      return ok('created');
    } catch (err) {
      if (err instanceof AlreadyExistsException) {
        return ok('already-exists');
      }
      return fail(classifyAwsError('CreateTable', err));
    }
  }
}
