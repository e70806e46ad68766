/**
 * Error taxonomy and process exit codes
 */

export const EXIT_CODES = {
  success: 0,
  credentials: 1,
  config: 1,
  classification: 2,
  describe: 3,
} as const;

/**
 * Base class for errors reported to the user; carries the exit status
 */
export class CliError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "CliError";
  }
}

/**
 * Invalid command-line options
 */
export class ConfigError extends CliError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, EXIT_CODES.config, options);
    this.name = "ConfigError";
  }
}

/**
 * Raised when credentials cannot be resolved or the identity check fails
 */
export class CredentialError extends CliError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, EXIT_CODES.credentials, options);
    this.name = "CredentialError";
  }
}

/**
 * The identifier could not be mapped to a resource type
 */
export class ClassificationError extends CliError {
  constructor(
    message: string,
    public readonly identifier: string,
    options?: ErrorOptions
  ) {
    super(message, EXIT_CODES.classification, options);
    this.name = "ClassificationError";
  }
}

export class MalformedArnError extends ClassificationError {
  constructor(identifier: string, reason: string) {
    super(`Invalid ARN '${identifier}': ${reason}`, identifier);
    this.name = "MalformedArnError";
  }
}

export class MalformedS3UrlError extends ClassificationError {
  constructor(identifier: string, reason: string) {
    super(`Invalid S3 URL '${identifier}': ${reason}`, identifier);
    this.name = "MalformedS3UrlError";
  }
}

export class UnrecognizedIdentifierError extends ClassificationError {
  constructor(identifier: string) {
    super(
      identifier
        ? `Cannot determine what type of resource '${identifier}' is.`
        : "Identifier must not be empty.",
      identifier
    );
    this.name = "UnrecognizedIdentifierError";
  }
}

/**
 * A lookup against an AWS API failed
 */
export class DescribeError extends CliError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, EXIT_CODES.describe, options);
    this.name = "DescribeError";
  }
}

export class UnsupportedResourceTypeError extends DescribeError {
  constructor(
    public readonly resourceType: string,
    public readonly subType: string | null
  ) {
    super(
      `Describing ${resourceType}${subType ? ` ${subType}` : ""} resources is not supported.`
    );
    this.name = "UnsupportedResourceTypeError";
  }
}

/**
 * Route 53 calls made while classifying a DNS name failed
 */
export class Route53LookupError extends DescribeError {
  constructor(name: string, options?: ErrorOptions) {
    super(
      `Route53 lookup for ${name} failed: ${errorMessage(options?.cause)}`,
      options
    );
    this.name = "Route53LookupError";
  }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Check for a "does not exist" style AWS error (by error name or HTTP 404)
 */
export function isNotFoundError(error: unknown, names: readonly string[] = []): boolean {
  if (!error || typeof error !== "object") {
    return false;
  }
  if ("name" in error && typeof error.name === "string" && names.includes(error.name)) {
    return true;
  }
  return (
    "$metadata" in error &&
    typeof error.$metadata === "object" &&
    error.$metadata !== null &&
    "httpStatusCode" in error.$metadata &&
    error.$metadata.httpStatusCode === 404
  );
}
