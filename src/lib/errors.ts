/**
 * Error types surfaced to the command dispatcher.
 */

/** The notes root is missing, not a directory, or unreadable. */
export class NotesDirError extends Error {
  constructor(
    readonly notesDir: string,
    reason: string,
  ) {
    super(`Notes directory ${notesDir} ${reason}`);
    this.name = "NotesDirError";
  }
}

/** A single note file could not be read. */
export class NoteReadError extends Error {
  constructor(
    readonly filePath: string,
    reason: string,
  ) {
    super(`Cannot read note ${filePath}: ${reason}`);
    this.name = "NoteReadError";
  }
}

/** A configuration file is missing or malformed. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Check a Node.js system error code, e.g. ENOENT.
 */
export function hasErrorCode(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}
