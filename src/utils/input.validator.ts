import { InvalidInputError } from '../errors/git.error';

/**
 * Characters git refuses anywhere in a ref name
 */
const FORBIDDEN_REF_CHARS = /[\s~^:?*[\\\x00-\x1f\x7f]/;

export type RefKind = 'branch' | 'tag';

/**
 * Validation for user supplied names before they reach git
 */
export class InputValidator {
  /**
   * Apply the rules of `git check-ref-format` to a branch or tag name
   */
  public static validateRefName(name: string, kind: RefKind): string {
    const trimmed = name.trim();
    const label = kind === 'branch' ? 'Branch' : 'Tag';

    if (!trimmed) {
      throw new InvalidInputError(`${label} name cannot be empty`);
    }

    const problem = InputValidator.findRefProblem(trimmed);
    if (problem) {
      throw new InvalidInputError(`Invalid ${kind} name "${trimmed}": ${problem}`);
    }

    return trimmed;
  }

  public static validateCommitMessage(message: string): string {
    const trimmed = message.trim();
    if (!trimmed) {
      throw new InvalidInputError('Commit message cannot be empty');
    }
    return trimmed;
  }

  private static findRefProblem(name: string): string | null {
    if (FORBIDDEN_REF_CHARS.test(name)) {
      return 'contains a space, control character or one of ~ ^ : ? * [ \\';
    }
    if (name.startsWith('-')) {
      return 'cannot start with "-"';
    }
    if (name.includes('..')) {
      return 'cannot contain ".."';
    }
    if (name.includes('@{') || name === '@') {
      return 'cannot contain "@{" or be "@"';
    }
    if (name.startsWith('/') || name.endsWith('/') || name.includes('//')) {
      return 'has an empty path component';
    }
    if (name.endsWith('.') || name.endsWith('.lock')) {
      return 'cannot end with "." or ".lock"';
    }
    if (name.split('/').some(component => component.startsWith('.'))) {
      return 'a path component cannot start with "."';
    }
    return null;
  }
}
