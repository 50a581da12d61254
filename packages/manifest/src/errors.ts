/**
 * Raised when a list file the validator depends on cannot be read
 * (the manifest itself, a GResource manifest, a Blueprint resource list).
 */
export class ManifestFileError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public override readonly cause?: Error
  ) {
    super(message);
    this.name = 'ManifestFileError';
  }
}
