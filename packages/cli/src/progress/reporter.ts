/**
 * Progress reporter with ora spinners
 *
 * Everything here writes to stderr so stdout carries only command output.
 */

import ora, { type Ora, type Color } from 'ora';

import { createColorFns } from './colors.js';
import { type ColorFunctions, type ProbePhase, type ReporterOptions, PHASE_NAMES } from './types.js';

export type { ProbePhase, ReporterOptions } from './types.js';

/**
 * Progress reporter for CLI output
 */
export class Reporter {
  private spinner: Ora | null = null;
  private phaseStartTime = 0;
  private readonly useColor: boolean;
  private readonly verbose: boolean;
  private readonly c: ColorFunctions;

  constructor(options: ReporterOptions = {}) {
    this.useColor = options.color ?? true;
    this.verbose = options.verbose ?? false;
    this.c = createColorFns(this.useColor);
  }

  /**
   * Color functions matching the color setting
   */
  get colors(): ColorFunctions {
    return this.c;
  }

  /**
   * Start a phase; the previous one is marked done
   */
  startPhase(phase: ProbePhase): void {
    this.debug(`phase ${phase}`);
    this.succeedSpinner();
    this.phaseStartTime = Date.now();

    const oraOptions: { text: string; stream: NodeJS.WritableStream; color?: Color } = {
      text: PHASE_NAMES[phase],
      stream: process.stderr,
    };
    if (this.useColor) {
      oraOptions.color = 'cyan';
    }
    this.spinner = ora(oraOptions).start();
  }

  /**
   * Stop the spinner after the last phase
   */
  complete(): void {
    this.succeedSpinner();
  }

  /**
   * Stop the spinner after a failure
   */
  fail(message?: string): void {
    if (this.spinner) {
      this.spinner.fail(message);
      this.spinner = null;
    }
  }

  /**
   * Verbose diagnostics
   */
  debug(message: string): void {
    if (!this.verbose) return;
    this.withSpinnerPaused(() => console.error(this.c.dim(`[tbx] ${message}`)));
  }

  private succeedSpinner(): void {
    if (!this.spinner) return;
    const elapsed = Date.now() - this.phaseStartTime;
    this.spinner.succeed(`${this.spinner.text} ${this.c.dim(`(${elapsed}ms)`)}`);
    this.spinner = null;
  }

  private withSpinnerPaused(write: () => void): void {
    if (this.spinner?.isSpinning) {
      this.spinner.clear();
      write();
      this.spinner.render();
    } else {
      write();
    }
  }
}
