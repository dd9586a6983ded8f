export class DecisionStoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DecisionStoreError";
  }
}

export class ConfigError extends DecisionStoreError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class StoreNotInitializedError extends DecisionStoreError {
  constructor(backend: string) {
    super(`The ${backend} decision store is not initialized. Call initialize() first.`);
    this.name = "StoreNotInitializedError";
  }
}

export class DecisionFileError extends DecisionStoreError {
  constructor(
    message: string,
    public readonly path: string,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = "DecisionFileError";
  }
}
