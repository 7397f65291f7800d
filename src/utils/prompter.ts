import { confirm, isCancel, password, text } from '@clack/prompts';

export interface TextPromptOptions {
  defaultValue?: string;
  placeholder?: string;
}

/**
 * Line-oriented user input. Every method resolves to null when the user
 * cancels (Ctrl+C / Esc).
 */
export interface Prompter {
  text(message: string, options?: TextPromptOptions): Promise<string | null>;
  secret(message: string): Promise<string | null>;
  confirm(message: string, initialValue?: boolean): Promise<boolean | null>;
}

/**
 * Terminal prompter backed by @clack/prompts
 */
export class ClackPrompter implements Prompter {
  public async text(message: string, options: TextPromptOptions = {}): Promise<string | null> {
    const answer = await text({
      message,
      placeholder: options.placeholder ?? options.defaultValue,
      defaultValue: options.defaultValue,
    });
    return isCancel(answer) ? null : answer.trim();
  }

  public async secret(message: string): Promise<string | null> {
    const answer = await password({ message });
    return isCancel(answer) ? null : answer.trim();
  }

  public async confirm(message: string, initialValue = false): Promise<boolean | null> {
    const answer = await confirm({ message, initialValue });
    return isCancel(answer) ? null : answer;
  }
}
