export class ConfigurationError extends Error {
  readonly name = 'ConfigurationError';

  constructor(message: string, readonly issues: string[] = []) {
    super(issues.length ? `${message}: ${issues.join('; ')}` : message);
  }
}

/** The record log does not exist yet or cannot be read. Treated as "no records". */
export class SourceUnavailableError extends Error {
  readonly name = 'SourceUnavailableError';

  constructor(readonly path: string, options?: { cause?: unknown }) {
    super(`Record log ${path} is not available`, options);
  }
}

export class DeliveryFailure extends Error {
  readonly name = 'DeliveryFailure';

  constructor(
    readonly batchSize: number,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(
      status !== undefined
        ? `Failed to send ${batchSize} records. Status code: ${status}`
        : `Failed to send ${batchSize} records: ${errorMessage(options?.cause)}`,
      options
    );
  }
}

export class MalformedRecordError extends Error {
  readonly name = 'MalformedRecordError';

  constructor(readonly row: number, readonly raw: string) {
    super(`Row ${row} is not a valid sample: ${JSON.stringify(raw)}`);
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
