/**
 * Errors thrown at the call site. Missing lookups on removal and degenerate
 * numeric input are no-ops instead.
 */

/** Mutually exclusive or missing arguments */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** A geometry operation reached a shape kind it has no case for */
export class UnsupportedShapeError extends Error {
  constructor(shape: unknown) {
    super(`Unsupported shape: ${JSON.stringify(shape)}`);
    this.name = 'UnsupportedShapeError';
  }
}

/** An image path was used before it was loaded into the cache */
export class MissingAssetError extends Error {
  readonly path: string;

  constructor(path: string) {
    super(`Image not loaded: ${path}`);
    this.name = 'MissingAssetError';
    this.path = path;
  }
}
