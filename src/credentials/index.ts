/**
 * Ambient signing credentials.
 *
 * A provider yields the service account used when a signing call does not
 * carry its own issuer and key. Providers are built explicitly from
 * {@link StorageCredentials}; nothing here reads the environment.
 */

import { readFile } from "node:fs/promises";
import { ConfigurationError, errorMessage } from "../error/index.js";
import type { StorageCredentials } from "../config/index.js";
import type { ServiceAccountCredentials } from "../types/index.js";
import { ServiceAccountKeySchema } from "./schema.js";

export { ServiceAccountKeySchema } from "./schema.js";
export type { ServiceAccountKey } from "./schema.js";

/**
 * Source of ambient signing credentials.
 */
export interface SigningCredentialsProvider {
  /**
   * Resolve the service account, or undefined when none is available.
   */
  getSigningCredentials(): Promise<ServiceAccountCredentials | undefined>;
}

/**
 * Provider with no credentials.
 */
export class NoCredentialsProvider implements SigningCredentialsProvider {
  async getSigningCredentials(): Promise<ServiceAccountCredentials | undefined> {
    return undefined;
  }
}

/**
 * Provider returning fixed credentials.
 */
export class StaticCredentialsProvider implements SigningCredentialsProvider {
  constructor(private readonly credentials: ServiceAccountCredentials) {}

  async getSigningCredentials(): Promise<ServiceAccountCredentials | undefined> {
    return this.credentials;
  }
}

/**
 * Provider reading a service account JSON key file.
 *
 * The file is read on first use; the outcome, success or failure, is kept
 * for later calls.
 */
export class ServiceAccountKeyFileProvider implements SigningCredentialsProvider {
  private loaded?: Promise<ServiceAccountCredentials>;

  constructor(private readonly keyFile: string) {}

  getSigningCredentials(): Promise<ServiceAccountCredentials | undefined> {
    if (!this.loaded) {
      this.loaded = this.load();
    }
    return this.loaded;
  }

  private async load(): Promise<ServiceAccountCredentials> {
    let contents: string;
    try {
      contents = await readFile(this.keyFile, "utf8");
    } catch (error) {
      throw new ConfigurationError(
        `Failed to read service account key file ${this.keyFile}: ${errorMessage(error)}`,
        "InvalidCredentials"
      );
    }

    let json: unknown;
    try {
      json = JSON.parse(contents);
    } catch (error) {
      throw new ConfigurationError(
        `Service account key file ${this.keyFile} is not valid JSON: ${errorMessage(error)}`,
        "InvalidCredentials"
      );
    }

    return parseServiceAccountKey(json, this.keyFile);
  }
}

/**
 * Validate service account key JSON and map it to credentials.
 *
 * @param source - Where the JSON came from, for error messages
 */
export function parseServiceAccountKey(
  json: unknown,
  source: string = "service account key"
): ServiceAccountCredentials {
  const result = ServiceAccountKeySchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid ${source}: ${issues}`, "InvalidCredentials");
  }

  const key = result.data;
  return {
    clientEmail: key.client_email,
    privateKey: key.private_key,
    projectId: key.project_id,
    privateKeyId: key.private_key_id,
  };
}

/**
 * Create a provider for configured credentials.
 */
export function createCredentialsProvider(
  credentials: StorageCredentials | undefined
): SigningCredentialsProvider {
  if (!credentials) {
    return new NoCredentialsProvider();
  }

  switch (credentials.type) {
    case "service_account":
      return new ServiceAccountKeyFileProvider(credentials.keyFile);
    case "service_account_json":
      return new StaticCredentialsProvider(
        parseServiceAccountKey(credentials.key, "service account key JSON")
      );
    case "signing_key":
      return new StaticCredentialsProvider({
        clientEmail: credentials.clientEmail,
        privateKey: credentials.privateKey,
      });
    case "none":
      return new NoCredentialsProvider();
  }
}
