/** Base class for failures of the persisted post collection */
export class StoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StoreError';
  }
}

/** The posts file exists but its contents are not a collection of posts */
export class ParseError extends StoreError {
  constructor(public readonly filePath: string, options?: { cause?: unknown; reason?: string }) {
    super(`Posts file ${options?.reason ?? 'is not a valid JSON array'}: ${filePath}`, { cause: options?.cause });
    this.name = 'ParseError';
  }
}

/** The posts file could not be read or written */
export class IOError extends StoreError {
  constructor(message: string, public readonly filePath: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'IOError';
  }
}
