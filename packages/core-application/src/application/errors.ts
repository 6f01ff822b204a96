export type InventoryErrorKind =
  | "FolderNotFound"
  | "RecordReadFailure"
  | "LoadCorrupt"
  | "SaveVerificationFailed"
  | "SaveFailed"
  | "RecoveryExhausted";

export type InventoryWarning = {
  kind: InventoryErrorKind;
  path: string;
  message: string;
};

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export class TableFormatError extends Error {
  constructor(message: string, public filePath: string, public cause?: unknown) {
    super(message);
    this.name = "TableFormatError";
  }
}

export class SaveVerificationFailedError extends Error {
  constructor(message: string, public filePath: string, public cause?: unknown) {
    super(message);
    this.name = "SaveVerificationFailedError";
  }
}

export class InvalidConfigError extends Error {
  constructor(message: string, public issues: string[] = []) {
    super(message);
    this.name = "InvalidConfigError";
  }
}
