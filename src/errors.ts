/**
 * Base error type shared by every deby module.
 *
 * Each subclass carries a stable `code` so callers (and the CLI's --json
 * output) can branch on the failure kind without string-matching messages.
 */

export type DebyErrorCode =
  | "config_invalid"
  | "config_file"
  | "empty_version"
  | "invalid_version"
  | "empty_changes"
  | "malformed_extra_field"
  | "file_io";

export abstract class DebyError extends Error {
  abstract readonly code: DebyErrorCode;

  /**
   * Format the error for terminal display.
   * Subclasses with structured detail override this.
   */
  format(): string {
    return this.message;
  }
}

/**
 * Failure reported by a FileStore while reading or writing a target file.
 * The underlying error is kept as `cause` and surfaced unchanged.
 */
export class FileIoError extends DebyError {
  readonly code = "file_io";

  constructor(
    public readonly path: string,
    public readonly operation: "read" | "write",
    cause: unknown
  ) {
    super(
      `Failed to ${operation} ${path}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
    this.name = "FileIoError";
  }
}
