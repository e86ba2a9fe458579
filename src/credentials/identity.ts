/**
 * Cloud identity check via STS GetCallerIdentity.
 */

import { GetCallerIdentityCommand, STSClient } from "@aws-sdk/client-sts";
import { CredentialError, formatErrorMessage } from "../errors.js";
import type { Credentials } from "./credentials.js";

export type CallerIdentity = {
  accountId: string;
  arn: string;
};

export interface IdentityVerifier {
  verify(credentials: Credentials): Promise<CallerIdentity>;
}

/** STS client configured from resolved credentials. */
export function createStsClient(credentials: Credentials): STSClient {
  return new STSClient({
    region: credentials.get("aws_region") || "us-east-1",
    credentials: {
      accessKeyId: credentials.get("aws_access_key_id"),
      secretAccessKey: credentials.get("aws_secret_access_key"),
    },
  });
}

export class StsIdentityVerifier implements IdentityVerifier {
  async verify(credentials: Credentials): Promise<CallerIdentity> {
    const client = createStsClient(credentials);
    try {
      const response = await client.send(new GetCallerIdentityCommand({}));
      if (!response.Account) {
        throw new CredentialError("Invalid", "aws_access_key_id", "identity response carried no account");
      }
      return { accountId: response.Account, arn: response.Arn ?? "" };
    } catch (err) {
      if (err instanceof CredentialError) throw err;
      throw new CredentialError("Invalid", "aws_access_key_id", formatErrorMessage(err));
    } finally {
      client.destroy();
    }
  }
}
