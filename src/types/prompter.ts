/**
 * Prompter interface
 * Abstracts terminal prompts for testability and non-interactive runs
 */

import type { Result } from './result';

export interface SelectChoice<T = string> {
  /** Display name for the choice */
  name: string;
  /** Value returned when this choice is selected */
  value: T;
  /** Optional description shown next to the choice */
  description?: string;
}

export interface SelectOptions<T = string> {
  message: string;
  choices: SelectChoice<T>[];
  /** Returned without asking when not interactive */
  default?: T;
}

export type PrompterErrorCode = 'CANCELLED' | 'NON_INTERACTIVE' | 'IO_ERROR';

export interface PrompterError {
  code: PrompterErrorCode;
  message: string;
  cause?: Error;
}

export interface Prompter {
  /**
   * Ask the user to pick one choice
   */
  select<T = string>(options: SelectOptions<T>): Promise<Result<T, PrompterError>>;

  /**
   * Whether prompts can be shown (TTY and interactive mode)
   */
  isInteractive(): boolean;
}

export function createPrompterError(
  code: PrompterErrorCode,
  message?: string,
  cause?: Error
): PrompterError {
  const defaultMessages: Record<PrompterErrorCode, string> = {
    CANCELLED: 'User cancelled the prompt',
    NON_INTERACTIVE: 'Cannot prompt in non-interactive mode',
    IO_ERROR: 'IO error during prompt',
  };
  return { code, message: message ?? defaultMessages[code], cause };
}
