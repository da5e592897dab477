/**
 * Thrown when a catalog file is missing, unparsable or malformed.
 * Always fatal: a catalog is either loaded completely or not at all.
 */
export class CatalogLoadError extends Error {
  constructor(
    message: string,
    public readonly source: string,
    public readonly field?: string
  ) {
    super(`Invalid control catalog ${source}: ${message}`);
    this.name = 'CatalogLoadError';
  }
}

/**
 * Thrown when a control id is not present in the catalog.
 */
export class UnknownControlError extends Error {
  constructor(public readonly controlId: string) {
    super(`Control ${controlId} not found in catalog`);
    this.name = 'UnknownControlError';
  }
}
