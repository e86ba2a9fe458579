/**
 * Remote secret store source backed by SSM Parameter Store.
 *
 * Parameters live under `<namespace>/<parameter>` and are read with
 * decryption. The client is built from whatever cloud keys higher-precedence
 * sources already resolved.
 */

import { GetParametersCommand, SSMClient } from "@aws-sdk/client-ssm";
import { formatErrorMessage } from "../errors.js";
import type { Logger } from "../logging/index.js";
import type { CredentialDefinition } from "./catalog.js";
import type { CredentialSource } from "./sources.js";

/** GetParameters accepts at most ten names per call. */
const BATCH_SIZE = 10;

export type ParameterStoreOptions = {
  namespace: string;
  logger: Logger;
  /** Region used when no region has been resolved yet. */
  region?: string;
};

export function parameterName(namespace: string, parameter: string): string {
  return `${namespace.replace(/\/+$/, "")}/${parameter}`;
}

export class ParameterStoreSource implements CredentialSource {
  readonly kind = "parameter-store";

  constructor(private readonly options: ParameterStoreOptions) {}

  async load(
    catalog: readonly CredentialDefinition[],
    resolved: ReadonlyMap<string, string>,
  ): Promise<Record<string, string>> {
    const byName = new Map<string, string>();
    for (const def of catalog) {
      if (def.parameter && !resolved.has(def.key)) {
        byName.set(parameterName(this.options.namespace, def.parameter), def.key);
      }
    }
    if (byName.size === 0) return {};

    const accessKeyId = resolved.get("aws_access_key_id");
    const secretAccessKey = resolved.get("aws_secret_access_key");
    const client = new SSMClient({
      region: resolved.get("aws_region") ?? this.options.region ?? "us-east-1",
      credentials: accessKeyId && secretAccessKey ? { accessKeyId, secretAccessKey } : undefined,
    });

    const values: Record<string, string> = {};
    const names = [...byName.keys()];
    try {
      for (let i = 0; i < names.length; i += BATCH_SIZE) {
        const response = await client.send(
          new GetParametersCommand({ Names: names.slice(i, i + BATCH_SIZE), WithDecryption: true }),
        );
        for (const param of response.Parameters ?? []) {
          const key = param.Name ? byName.get(param.Name) : undefined;
          if (key && param.Value) values[key] = param.Value;
        }
      }
      this.options.logger.debug("Read parameter store", {
        namespace: this.options.namespace,
        found: Object.keys(values),
      });
    } catch (err) {
      this.options.logger.warn("Parameter store unavailable; continuing without it", {
        namespace: this.options.namespace,
        error: formatErrorMessage(err),
      });
    } finally {
      client.destroy();
    }
    return values;
  }
}
