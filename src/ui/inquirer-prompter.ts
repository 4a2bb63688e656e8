/**
 * Inquirer-based Prompter
 * Terminal prompts for the review step; falls back to defaults off a TTY
 */

import inquirer from 'inquirer';
import type { Prompter, SelectOptions, PrompterError } from '../types/prompter';
import { createPrompterError } from '../types/prompter';
import type { Result } from '../types/result';
import { ok, err } from '../types/result';

export interface InquirerPrompterConfig {
  /** Whether prompts may be shown at all */
  interactive: boolean;
}

export class InquirerPrompter implements Prompter {
  private config: InquirerPrompterConfig;

  constructor(config: Partial<InquirerPrompterConfig> = {}) {
    this.config = {
      interactive: config.interactive ?? true,
    };
  }

  isInteractive(): boolean {
    return this.config.interactive && (process.stdout.isTTY ?? false);
  }

  async select<T = string>(options: SelectOptions<T>): Promise<Result<T, PrompterError>> {
    if (!this.isInteractive()) {
      if (options.default !== undefined) {
        return ok(options.default);
      }
      const [first] = options.choices;
      if (first) {
        return ok(first.value);
      }
      return err(createPrompterError('NON_INTERACTIVE', 'Cannot prompt for selection in non-interactive mode'));
    }

    try {
      const response = await inquirer.prompt<{ value: T }>([
        {
          type: 'list',
          name: 'value',
          message: options.message,
          choices: options.choices.map((c) => ({
            name: c.description ? `${c.name} - ${c.description}` : c.name,
            value: c.value,
          })),
          default: options.default,
        },
      ]);
      return ok(response.value);
    } catch (error) {
      if (this.isCancelledError(error)) {
        return err(createPrompterError('CANCELLED'));
      }
      return err(
        createPrompterError(
          'IO_ERROR',
          `select failed: ${error instanceof Error ? error.message : String(error)}`,
          error instanceof Error ? error : undefined
        )
      );
    }
  }

  private isCancelledError(error: unknown): boolean {
    // Ctrl+C
    if (error instanceof Error) {
      return error.name === 'ExitPromptError' || error.message.includes('User force closed');
    }
    return false;
  }
}

export function createInquirerPrompter(config?: Partial<InquirerPrompterConfig>): Prompter {
  return new InquirerPrompter(config);
}
