export class StrataError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = this.constructor.name;
  }
}

export class ConfigError extends StrataError {}
export class EmbeddingError extends StrataError {}
export class VectorDBError extends StrataError {}
export class RecordStoreError extends StrataError {}
export class SummarizerError extends StrataError {}
export class BackupError extends StrataError {}
export class BootstrapError extends StrataError {}

/** Caller broke an operation's contract; raised before any storage is touched. */
export class UsageError extends StrataError {}
