import { ImportFailureKind } from '../inventory/inventory.types';

/** Failures that abort a whole submission, as opposed to collected row errors. */
export abstract class ImportFailure extends Error {
  abstract readonly kind: ImportFailureKind;
}

export class DecodeFailure extends ImportFailure {
  readonly kind = 'decode';

  constructor(
    readonly attemptedEncodings: string[],
    detail?: string,
  ) {
    super(
      detail
        ? `Unable to read file as CSV: ${detail}`
        : `Unable to decode file. Tried encodings: ${attemptedEncodings.join(', ')}`,
    );
    this.name = 'DecodeFailure';
  }
}

export class SchemaFailure extends ImportFailure {
  readonly kind = 'schema';

  constructor(readonly missingColumns: string[]) {
    super(`Missing required columns: ${missingColumns.join(', ')}`);
    this.name = 'SchemaFailure';
  }
}

export class RowLimitExceeded extends ImportFailure {
  readonly kind = 'row_limit';

  constructor(
    readonly rowCount: number,
    readonly maxRows: number,
  ) {
    super(`File has ${rowCount} data rows; the limit is ${maxRows}`);
    this.name = 'RowLimitExceeded';
  }
}

export class StoreCommitFailure extends ImportFailure {
  readonly kind = 'commit';

  constructor(readonly causeMessage: string) {
    super(`Import aborted, no changes were saved: ${causeMessage}`);
    this.name = 'StoreCommitFailure';
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
