/**
 * Storage Reconciler
 *
 * Creates and removes the durable storage that backs provisioning state:
 * a versioned, encrypted S3 bucket for state files, a DynamoDB table for
 * state locks, and the parameter namespace holding deployment secrets.
 * Every step checks before it mutates, so repeated runs converge.
 */

import {
  BucketLocationConstraint,
  CreateBucketCommand,
  DeleteBucketCommand,
  DeleteObjectsCommand,
  HeadBucketCommand,
  ListObjectVersionsCommand,
  PutBucketEncryptionCommand,
  PutBucketTaggingCommand,
  PutBucketVersioningCommand,
  PutPublicAccessBlockCommand,
  S3Client,
  type ObjectIdentifier,
} from "@aws-sdk/client-s3";
import {
  CreateTableCommand,
  DeleteTableCommand,
  DescribeTableCommand,
  DynamoDBClient,
  waitUntilTableExists,
} from "@aws-sdk/client-dynamodb";
import { DeleteParametersCommand, GetParametersByPathCommand, SSMClient } from "@aws-sdk/client-ssm";
import { GetCallerIdentityCommand } from "@aws-sdk/client-sts";
import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { FleetConfig } from "../config/index.js";
import { createStsClient, type Credentials } from "../credentials/index.js";
import { StorageError } from "../errors.js";
import type { Logger } from "../logging/index.js";
import { BACKEND_FILE, backendFromHandle, generateBackendHCL } from "../provisioning/backend-configs.js";
import type { StorageHandle } from "../types.js";

// =============================================================================
// Types
// =============================================================================

/** `planned` is reported in dry-run for a change that would be made. */
export type ResourceStatus = "created" | "exists" | "deleted" | "absent" | "planned";

export type EnsureReport = {
  bucket: ResourceStatus;
  lockTable: ResourceStatus;
  /** Path of the backend file written, when one was. */
  backendFile?: string;
};

export type StorageDestroyReport = {
  bucket: ResourceStatus;
  lockTable: ResourceStatus;
  /** Parameters removed (or that would be, in dry-run). */
  parameters: number;
};

export type StorageReconcilerOptions = {
  project: string;
  storage: FleetConfig["storage"];
  parameterNamespace: string;
  terraformDir: string;
  logger: Logger;
};

export type StorageRunOptions = {
  dryRun?: boolean;
};

const DEFAULT_REGION = "us-east-1";
const TABLE_WAIT_SECONDS = 120;
const PARAMETER_BATCH = 10;

// =============================================================================
// Helpers
// =============================================================================

function errorName(err: unknown): string | undefined {
  return err instanceof Error ? err.name : undefined;
}

function locationConstraint(region: string): BucketLocationConstraint | undefined {
  return Object.values(BucketLocationConstraint).find((constraint) => constraint === region);
}

type Clients = {
  s3: S3Client;
  dynamodb: DynamoDBClient;
  ssm: SSMClient;
  destroy(): void;
};

function createClients(handle: StorageHandle, credentials: Credentials): Clients {
  const config = {
    region: handle.region,
    credentials: {
      accessKeyId: credentials.get("aws_access_key_id"),
      secretAccessKey: credentials.get("aws_secret_access_key"),
    },
  };
  const s3 = new S3Client(config);
  const dynamodb = new DynamoDBClient(config);
  const ssm = new SSMClient(config);
  return {
    s3,
    dynamodb,
    ssm,
    destroy() {
      s3.destroy();
      dynamodb.destroy();
      ssm.destroy();
    },
  };
}

/** Run an SDK step, reporting any failure as a StorageError. */
async function step<T>(resource: string, operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof StorageError) throw err;
    throw new StorageError(resource, operation, err);
  }
}

// =============================================================================
// Reconciler
// =============================================================================

export class StorageReconciler {
  private readonly logger: Logger;

  constructor(private readonly options: StorageReconcilerOptions) {
    this.logger = options.logger.child("storage");
  }

  /**
   * Names for this environment's storage. The bucket defaults to
   * `<project>-tfstate-<accountId>`, which needs one identity lookup.
   */
  async resolveHandle(credentials: Credentials, environment: string): Promise<StorageHandle> {
    const { storage, project } = this.options;
    const region = storage.region ?? (credentials.get("aws_region") || DEFAULT_REGION);
    const bucket = storage.bucket ?? `${project}-tfstate-${await this.accountId(credentials)}`;
    return {
      region,
      bucket,
      lockTable: storage.lockTable ?? `${project}-tf-locks`,
      stateKey: storage.stateKey ?? `${environment}/terraform.tfstate`,
      secretNamespace: this.options.parameterNamespace,
    };
  }

  async ensure(handle: StorageHandle, credentials: Credentials, options: StorageRunOptions = {}): Promise<EnsureReport> {
    const clients = createClients(handle, credentials);
    try {
      const bucket = await this.ensureBucket(clients.s3, handle, options);
      const lockTable = await this.ensureLockTable(clients.dynamodb, handle, options);
      const report: EnsureReport = { bucket, lockTable };

      if (this.options.storage.writeBackendConfig) {
        const path = join(this.options.terraformDir, BACKEND_FILE);
        if (options.dryRun) {
          this.logger.info(`Would write backend configuration to ${path}`);
        } else {
          await step(path, "write", () => writeFile(path, generateBackendHCL(backendFromHandle(handle))));
          this.logger.info(`Wrote backend configuration to ${path}`);
          report.backendFile = path;
        }
      }
      return report;
    } finally {
      clients.destroy();
    }
  }

  async destroy(
    handle: StorageHandle,
    credentials: Credentials,
    options: StorageRunOptions = {},
  ): Promise<StorageDestroyReport> {
    const clients = createClients(handle, credentials);
    try {
      const bucket = await this.destroyBucket(clients.s3, handle, options);
      const lockTable = await this.destroyLockTable(clients.dynamodb, handle, options);
      const parameters = await this.destroyParameters(clients.ssm, handle, options);
      return { bucket, lockTable, parameters };
    } finally {
      clients.destroy();
    }
  }

  // ── Identity ──────────────────────────────────────────────────

  private async accountId(credentials: Credentials): Promise<string> {
    const sts = createStsClient(credentials);
    try {
      const identity = await step("identity", "lookup", () => sts.send(new GetCallerIdentityCommand({})));
      if (!identity.Account) throw new StorageError("identity", "lookup", "no account id returned");
      return identity.Account;
    } finally {
      sts.destroy();
    }
  }

  // ── Bucket ────────────────────────────────────────────────────

  private async bucketExists(s3: S3Client, bucket: string): Promise<boolean> {
    try {
      await s3.send(new HeadBucketCommand({ Bucket: bucket }));
      return true;
    } catch (err) {
      const name = errorName(err);
      if (name === "NotFound" || name === "NoSuchBucket") return false;
      throw new StorageError(bucket, "head", err);
    }
  }

  private async ensureBucket(s3: S3Client, handle: StorageHandle, options: StorageRunOptions): Promise<ResourceStatus> {
    const { bucket, region } = handle;
    if (await this.bucketExists(s3, bucket)) {
      this.logger.info(`State bucket ${bucket} already exists`);
      return "exists";
    }
    if (options.dryRun) {
      this.logger.info(`Would create state bucket ${bucket} in ${region}`);
      return "planned";
    }

    const constraint = region === DEFAULT_REGION ? undefined : locationConstraint(region);
    if (region !== DEFAULT_REGION && !constraint) {
      throw new StorageError(bucket, "create", `unsupported region ${region}`);
    }

    this.logger.info(`Creating state bucket ${bucket} in ${region}`);
    await step(bucket, "create", () =>
      s3.send(
        new CreateBucketCommand({
          Bucket: bucket,
          CreateBucketConfiguration: constraint ? { LocationConstraint: constraint } : undefined,
        }),
      ),
    );
    await step(bucket, "enable versioning", () =>
      s3.send(new PutBucketVersioningCommand({ Bucket: bucket, VersioningConfiguration: { Status: "Enabled" } })),
    );
    await step(bucket, "enable encryption", () =>
      s3.send(
        new PutBucketEncryptionCommand({
          Bucket: bucket,
          ServerSideEncryptionConfiguration: {
            Rules: [{ ApplyServerSideEncryptionByDefault: { SSEAlgorithm: "AES256" } }],
          },
        }),
      ),
    );
    await step(bucket, "block public access", () =>
      s3.send(
        new PutPublicAccessBlockCommand({
          Bucket: bucket,
          PublicAccessBlockConfiguration: {
            BlockPublicAcls: true,
            IgnorePublicAcls: true,
            BlockPublicPolicy: true,
            RestrictPublicBuckets: true,
          },
        }),
      ),
    );
    await step(bucket, "tag", () =>
      s3.send(new PutBucketTaggingCommand({ Bucket: bucket, Tagging: { TagSet: this.tags() } })),
    );
    return "created";
  }

  private async destroyBucket(s3: S3Client, handle: StorageHandle, options: StorageRunOptions): Promise<ResourceStatus> {
    const { bucket } = handle;
    if (!(await this.bucketExists(s3, bucket))) {
      this.logger.info(`State bucket ${bucket} is already gone`);
      return "absent";
    }
    if (options.dryRun) {
      this.logger.info(`Would delete state bucket ${bucket} and every object version in it`);
      return "planned";
    }

    let keyMarker: string | undefined;
    let versionIdMarker: string | undefined;
    let removed = 0;
    for (;;) {
      const page = await step(bucket, "list versions", () =>
        s3.send(
          new ListObjectVersionsCommand({ Bucket: bucket, KeyMarker: keyMarker, VersionIdMarker: versionIdMarker }),
        ),
      );
      const objects: ObjectIdentifier[] = [];
      for (const item of [...(page.Versions ?? []), ...(page.DeleteMarkers ?? [])]) {
        if (item.Key) objects.push({ Key: item.Key, VersionId: item.VersionId });
      }
      if (objects.length > 0) {
        await step(bucket, "delete objects", () =>
          s3.send(new DeleteObjectsCommand({ Bucket: bucket, Delete: { Objects: objects, Quiet: true } })),
        );
        removed += objects.length;
      }
      if (!page.IsTruncated) break;
      keyMarker = page.NextKeyMarker;
      versionIdMarker = page.NextVersionIdMarker;
    }

    await step(bucket, "delete", () => s3.send(new DeleteBucketCommand({ Bucket: bucket })));
    this.logger.info(`Deleted state bucket ${bucket} (${removed} object versions)`);
    return "deleted";
  }

  // ── Lock table ────────────────────────────────────────────────

  private async tableExists(dynamodb: DynamoDBClient, table: string): Promise<boolean> {
    try {
      await dynamodb.send(new DescribeTableCommand({ TableName: table }));
      return true;
    } catch (err) {
      if (errorName(err) === "ResourceNotFoundException") return false;
      throw new StorageError(table, "describe", err);
    }
  }

  private async ensureLockTable(
    dynamodb: DynamoDBClient,
    handle: StorageHandle,
    options: StorageRunOptions,
  ): Promise<ResourceStatus> {
    const table = handle.lockTable;
    if (await this.tableExists(dynamodb, table)) {
      this.logger.info(`Lock table ${table} already exists`);
      return "exists";
    }
    if (options.dryRun) {
      this.logger.info(`Would create lock table ${table}`);
      return "planned";
    }

    this.logger.info(`Creating lock table ${table}`);
    await step(table, "create", () =>
      dynamodb.send(
        new CreateTableCommand({
          TableName: table,
          AttributeDefinitions: [{ AttributeName: "LockID", AttributeType: "S" }],
          KeySchema: [{ AttributeName: "LockID", KeyType: "HASH" }],
          BillingMode: "PAY_PER_REQUEST",
          Tags: this.tags(),
        }),
      ),
    );
    await step(table, "wait for active", () =>
      waitUntilTableExists({ client: dynamodb, maxWaitTime: TABLE_WAIT_SECONDS }, { TableName: table }),
    );
    return "created";
  }

  private async destroyLockTable(
    dynamodb: DynamoDBClient,
    handle: StorageHandle,
    options: StorageRunOptions,
  ): Promise<ResourceStatus> {
    const table = handle.lockTable;
    if (!(await this.tableExists(dynamodb, table))) {
      this.logger.info(`Lock table ${table} is already gone`);
      return "absent";
    }
    if (options.dryRun) {
      this.logger.info(`Would delete lock table ${table}`);
      return "planned";
    }
    try {
      await dynamodb.send(new DeleteTableCommand({ TableName: table }));
    } catch (err) {
      if (errorName(err) === "ResourceNotFoundException") return "absent";
      throw new StorageError(table, "delete", err);
    }
    this.logger.info(`Deleted lock table ${table}`);
    return "deleted";
  }

  // ── Parameters ────────────────────────────────────────────────

  private async destroyParameters(ssm: SSMClient, handle: StorageHandle, options: StorageRunOptions): Promise<number> {
    const namespace = handle.secretNamespace;
    const names: string[] = [];
    let nextToken: string | undefined;
    do {
      const page = await step(namespace, "list parameters", () =>
        ssm.send(new GetParametersByPathCommand({ Path: namespace, Recursive: true, NextToken: nextToken })),
      );
      for (const param of page.Parameters ?? []) {
        if (param.Name) names.push(param.Name);
      }
      nextToken = page.NextToken;
    } while (nextToken);

    if (options.dryRun) {
      this.logger.info(`Would delete ${names.length} parameters under ${namespace}`);
      return names.length;
    }
    for (let i = 0; i < names.length; i += PARAMETER_BATCH) {
      const batch = names.slice(i, i + PARAMETER_BATCH);
      await step(namespace, "delete parameters", () => ssm.send(new DeleteParametersCommand({ Names: batch })));
    }
    this.logger.info(`Deleted ${names.length} parameters under ${namespace}`);
    return names.length;
  }

  private tags(): Array<{ Key: string; Value: string }> {
    return [
      { Key: "Project", Value: this.options.project },
      { Key: "ManagedBy", Value: "fleet-bootstrap" },
      { Key: "Purpose", Value: "terraform-state" },
    ];
  }
}
