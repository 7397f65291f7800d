/**
 * Base class for every error raised by gitchore.
 *
 * `details` carries captured diagnostic output (stderr of a failed tool,
 * compiler log excerpts); `hint` carries a remediation suggestion shown to
 * the user below the summary line.
 */
export abstract class BaseError extends Error {
  public abstract readonly code: string;
  public abstract readonly recoverable: boolean;
  public readonly details?: string | undefined;
  public readonly hint?: string | undefined;

  constructor(message: string, details?: string, hint?: string) {
    super(message);
    this.name = new.target.name;
    this.details = details;
    this.hint = hint;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Flatten an unknown thrown value into a message string
   */
  public static messageOf(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}
