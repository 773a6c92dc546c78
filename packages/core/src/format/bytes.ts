/**
 * Binary byte-quantity formatting
 */

const UNITS = ['KiB', 'MiB', 'GiB', 'TiB', 'PiB', 'EiB', 'ZiB', 'YiB'] as const;

/**
 * Format a quantity given in KiB with one decimal and the largest
 * binary unit that keeps the magnitude below 1024
 *
 * @example
 * ```typescript
 * formatKib(1024); // '1.0 MiB'
 * formatKib(1023.9); // '1023.9 KiB'
 * ```
 */
export function formatKib(value: number): string {
  let unit = 0;
  while (Math.abs(value) >= 1024 && unit < UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return `${value.toFixed(1)} ${UNITS[unit] ?? 'YiB'}`;
}

/**
 * Format a raw byte count, such as a table file size
 */
export function formatBytes(bytes: number): string {
  return formatKib(bytes / 1024);
}
