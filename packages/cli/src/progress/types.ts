/**
 * Shared types for reporter and formatters
 */

/**
 * Color function type for conditional colorization
 */
export type ColorFn = (text: string) => string;

/**
 * Color functions bundle
 */
export interface ColorFunctions {
  bold: ColorFn;
  dim: ColorFn;
  green: ColorFn;
  red: ColorFn;
  yellow: ColorFn;
  cyan: ColorFn;
  magenta: ColorFn;
}

/**
 * Phases of a position lookup
 */
export type ProbePhase = 'parse' | 'probe' | 'report';

/**
 * Phase display names
 */
export const PHASE_NAMES: Record<ProbePhase, string> = {
  parse: 'Reading position',
  probe: 'Probing tablebase',
  report: 'Classifying moves',
};

/**
 * Reporter options
 */
export interface ReporterOptions {
  /** Enable colored output (default: true) */
  color?: boolean;
  /** Diagnostics on stderr (default: false) */
  verbose?: boolean;
}
