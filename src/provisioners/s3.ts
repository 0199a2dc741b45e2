import { setTimeout as sleep } from 'node:timers/promises';
import {
  BucketAlreadyOwnedByYou,
  BucketLocationConstraint,
  type CreateBucketCommandInput,
  type S3,
} from '@aws-sdk/client-s3';
import { AuthError, ProviderError, classifyAwsError, fail, ok, type Result } from '../engine/errors';
import { DEFAULT_REGION, REGION_ID_PATTERN } from '../engine/config';
import type { StorageLocation } from '../dataset/players';

/** The subset of the S3 client the provisioner talks to */
export type S3BucketClient = Pick<S3, 'createBucket' | 'headBucket' | 'putObject'>;

export type BucketOutcome = 'created' | 'already-owned';

export type ReadinessOptions = {
  maxAttempts: number;
  intervalMs: number;
};

const KNOWN_CONSTRAINTS: ReadonlySet<string> = new Set(Object.values(BucketLocationConstraint));

// S3 takes any region id on the wire; the SDK union only lists the regions known at its release
const isLocationConstraint = (region: string): region is BucketLocationConstraint =>
  KNOWN_CONSTRAINTS.has(region) || REGION_ID_PATTERN.test(region);

/**
 * Object store provisioner backed by S3.
 * Creates the data lake bucket, waits for it to become visible and writes objects into it.
 */
export class S3BucketProvisioner {
  private readonly client: S3BucketClient;

  constructor(client: S3BucketClient) {
    this.client = client;
  }

  /**
   * Create the bucket, treating "already owned by you" as success.
   * The default region rejects an explicit LocationConstraint, so it is only sent elsewhere.
   */
  async ensureBucket(name: string, region: string): Promise<Result<BucketOutcome, AuthError | ProviderError>> {
    const input = this.buildCreateInput(name, region);
    if (!input.ok) {
      return input;
    }

    try {
      await this.client.createBucket(input.value);
      return ok('created');
    } catch (err) {
      if (err instanceof BucketAlreadyOwnedByYou) {
        return ok('already-owned');
      }
      return fail(classifyAwsError('CreateBucket', err));
    }
  }

  /**
   * Poll HeadBucket until the bucket answers or the attempts run out.
   * Resolves with the number of checks it took.
   */
  async waitForBucket(name: string, options: ReadinessOptions): Promise<Result<number, AuthError | ProviderError>> {
    let lastError: ProviderError | undefined;

    for (let attempt = 1; attempt <= options.maxAttempts; attempt++) {
      try {
        await this.client.headBucket({ Bucket: name });
        return ok(attempt);
      } catch (err) {
        const classified = classifyAwsError('HeadBucket', err);
        if (classified.category === 'auth') {
          return fail(classified);
        }
        lastError = classified;
      }

      if (attempt < options.maxAttempts && options.intervalMs > 0) {
        await sleep(options.intervalMs);
      }
    }

    const detail = lastError ? ` (last error: ${lastError.providerCode})` : '';
    return fail(
      new ProviderError(
        'HeadBucket',
        'BucketNotReady',
        `Bucket "${name}" not visible after ${options.maxAttempts} attempts${detail}`,
        { cause: lastError }
      )
    );
  }

  async putObject(location: StorageLocation, body: string): Promise<Result<void, AuthError | ProviderError>> {
    try {
      await this.client.putObject({
        Bucket: location.bucket,
        Key: location.key,
        Body: body,
        ContentType: 'application/x-ndjson',
      });
      return ok(undefined);
    } catch (err) {
      return fail(classifyAwsError('PutObject', err));
    }
  }

  private buildCreateInput(name: string, region: string): Result<CreateBucketCommandInput, ProviderError> {
    if (region === DEFAULT_REGION) {
      return ok({ Bucket: name });
    }

    if (!isLocationConstraint(region)) {
      return fail(
        new ProviderError('CreateBucket', 'InvalidLocationConstraint', `"${region}" is not an AWS region id`)
      );
    }

    return ok({ Bucket: name, CreateBucketConfiguration: { LocationConstraint: region } });
  }
}
