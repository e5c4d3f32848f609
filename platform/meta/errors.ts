export class MetaError extends Error {
  public readonly code: string;

  constructor(code: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "MetaError";
    this.code = code;
  }
}

export class UnsupportedTypeTag extends MetaError {
  public readonly tag: string;

  constructor(tag: string) {
    super("META_UNSUPPORTED_TYPE_TAG", `Unsupported meta type tag "${tag}"`);
    this.name = "UnsupportedTypeTag";
    this.tag = tag;
  }
}

export class UnsupportedMetaValue extends MetaError {
  constructor(message: string) {
    super("META_UNSUPPORTED_VALUE", message);
    this.name = "UnsupportedMetaValue";
  }
}

export class MetaDecodeError extends MetaError {
  constructor(tag: string, text: string) {
    super("META_DECODE_FAILED", `Stored text ${JSON.stringify(text)} is not a valid ${tag} value`);
    this.name = "MetaDecodeError";
  }
}

export class StoreFailure extends MetaError {
  public readonly operation: string;

  constructor(operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super("META_STORE_FAILURE", `Companion store ${operation} failed: ${detail}`, { cause });
    this.name = "StoreFailure";
    this.operation = operation;
  }
}

export class MetaInvariantViolation extends MetaError {
  constructor(message: string) {
    super("META_INVARIANT_VIOLATION", message);
    this.name = "MetaInvariantViolation";
  }
}

export type FlushFailure = Readonly<{
  key: string;
  error: Error;
}>;

export class MetaFlushError extends MetaError {
  public readonly failures: readonly FlushFailure[];

  constructor(failures: readonly FlushFailure[]) {
    const keys = failures.map((f) => f.key).join(", ");
    super("META_FLUSH_PARTIAL", `Failed to flush ${failures.length} queued meta write(s): ${keys}`);
    this.name = "MetaFlushError";
    this.failures = failures;
  }
}

export class MetaConfigError extends MetaError {
  public readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super("META_CONFIG_INVALID", `Invalid meta configuration: ${issues.join("; ")}`);
    this.name = "MetaConfigError";
    this.issues = issues;
  }
}

/** Wraps anything thrown by a storage primitive; an existing MetaError passes through. */
export function toStoreFailure(operation: string, err: unknown): MetaError {
  if (err instanceof MetaError) return err;
  return new StoreFailure(operation, err);
}
