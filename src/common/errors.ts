/**
 * Errors raised by the sync job. The CLI maps any of them to a non-zero
 * exit code; nothing here is retried within a run.
 */

export class ConfigFileError extends Error {
  constructor(
    readonly filePath: string,
    readonly issues: string[],
  ) {
    super(`Invalid configuration file ${filePath}: ${issues.join('; ')}`);
    this.name = 'ConfigFileError';
  }
}

export class MissingTokenError extends Error {
  constructor(readonly tokenPath: string) {
    super(
      `No usable SalesForce OAuth2 token in ${tokenPath}. Run the "authorize" command first.`,
    );
    this.name = 'MissingTokenError';
  }
}

export class SalesforceApiError extends Error {
  constructor(
    message: string,
    readonly statusCode?: number,
    readonly errorCode?: string,
  ) {
    super(message);
    this.name = 'SalesforceApiError';
  }
}

export class FlowdockApiError extends Error {
  constructor(
    message: string,
    readonly statusCode?: number,
  ) {
    super(message);
    this.name = 'FlowdockApiError';
  }
}

export class DeliveryError extends Error {
  constructor(readonly failures: number) {
    super(`${failures} item(s) could not be delivered to Flowdock`);
    this.name = 'DeliveryError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
