/**
 * Spinner Service
 * Progress display for the CLI: ora on a TTY, plain lines elsewhere
 */

import ora, { type Ora } from 'ora';

export type SpinnerColor = 'red' | 'green' | 'yellow' | 'blue' | 'magenta' | 'cyan' | 'white' | 'gray';

export interface SpinnerOptions {
  text: string;
  color?: SpinnerColor;
  /** Symbol printed before the text when not spinning */
  prefixSymbol?: string;
}

export interface Spinner {
  start(): void;
  succeed(text?: string): void;
  fail(text?: string): void;
  warn(text?: string): void;
  setText(text: string): void;
  stop(): void;
  readonly isSpinning: boolean;
}

export interface SpinnerServiceConfig {
  isTTY: boolean;
  /** Suppress all output (used with --json) */
  quiet: boolean;
  stream: NodeJS.WriteStream;
}

class NullSpinner implements Spinner {
  private spinning = false;

  start(): void {
    this.spinning = true;
  }
  succeed(): void {
    this.spinning = false;
  }
  fail(): void {
    this.spinning = false;
  }
  warn(): void {
    this.spinning = false;
  }
  setText(): void {}
  stop(): void {
    this.spinning = false;
  }
  get isSpinning(): boolean {
    return this.spinning;
  }
}

/**
 * One line per state change, for logs and CI output
 */
class TextSpinner implements Spinner {
  private spinning = false;

  constructor(
    private text: string,
    private readonly stream: NodeJS.WriteStream,
    private readonly prefixSymbol: string
  ) {}

  start(): void {
    this.spinning = true;
    this.stream.write(`${this.prefixSymbol} ${this.text}\n`);
  }

  succeed(text?: string): void {
    this.finish('✔', text);
  }

  fail(text?: string): void {
    this.finish('✖', text);
  }

  warn(text?: string): void {
    this.finish('⚠', text);
  }

  setText(text: string): void {
    this.text = text;
    if (this.spinning) {
      this.stream.write(`${this.prefixSymbol} ${text}\n`);
    }
  }

  stop(): void {
    this.spinning = false;
  }

  get isSpinning(): boolean {
    return this.spinning;
  }

  private finish(symbol: string, text?: string): void {
    this.spinning = false;
    this.stream.write(`${symbol} ${text ?? this.text}\n`);
  }
}

class OraSpinner implements Spinner {
  private readonly instance: Ora;

  constructor(text: string, color: SpinnerColor | undefined, stream: NodeJS.WriteStream) {
    this.instance = ora({ text, color, stream });
  }

  start(): void {
    this.instance.start();
  }
  succeed(text?: string): void {
    this.instance.succeed(text);
  }
  fail(text?: string): void {
    this.instance.fail(text);
  }
  warn(text?: string): void {
    this.instance.warn(text);
  }
  setText(text: string): void {
    this.instance.text = text;
  }
  stop(): void {
    this.instance.stop();
  }
  get isSpinning(): boolean {
    return this.instance.isSpinning;
  }
}

/**
 * Hands out spinners; only one is active at a time
 */
export class SpinnerService {
  private readonly config: SpinnerServiceConfig;
  private activeSpinner: Spinner | null = null;

  constructor(config: Partial<SpinnerServiceConfig> = {}) {
    const stream = config.stream ?? process.stderr;
    this.config = {
      isTTY: config.isTTY ?? stream.isTTY ?? false,
      quiet: config.quiet ?? false,
      stream,
    };
  }

  create(options: SpinnerOptions): Spinner {
    if (this.activeSpinner?.isSpinning) {
      this.activeSpinner.stop();
    }

    let spinner: Spinner;
    if (this.config.quiet) {
      spinner = new NullSpinner();
    } else if (this.config.isTTY) {
      spinner = new OraSpinner(options.text, options.color, this.config.stream);
    } else {
      spinner = new TextSpinner(options.text, this.config.stream, options.prefixSymbol ?? '>');
    }

    this.activeSpinner = spinner;
    return spinner;
  }

  start(text: string, color?: SpinnerColor): Spinner {
    const spinner = this.create({ text, color });
    spinner.start();
    return spinner;
  }

  stopAll(): void {
    if (this.activeSpinner?.isSpinning) {
      this.activeSpinner.stop();
    }
    this.activeSpinner = null;
  }
}

export function createSpinnerService(config?: Partial<SpinnerServiceConfig>): SpinnerService {
  return new SpinnerService(config);
}
