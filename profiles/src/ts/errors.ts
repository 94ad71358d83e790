/**
 * Thrown when dictionary JSON does not describe valid entries.
 */
export class DictionaryFormatError extends Error {
  /** Offending entry index ("entry 3") or key ("key \"G81\"") */
  public readonly location: string;

  constructor(location: string, message: string) {
    super(`Invalid dictionary ${location}: ${message}`);
    this.name = "DictionaryFormatError";
    this.location = location;
  }
}

/**
 * Thrown when a profile file exists but cannot be read or parsed.
 */
export class ProfileLoadError extends Error {
  public readonly filePath: string;

  constructor(filePath: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to load ${filePath}: ${reason}`, { cause });
    this.name = "ProfileLoadError";
    this.filePath = filePath;
  }
}
