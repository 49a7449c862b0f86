/**
 * calcexpr – console logging
 *
 * License: Apache-2.0
 */

export type LogLevel = 'warn' | 'error';

export function log(level: LogLevel, message: string): void {
  const prefix = level === 'warn' ? '[calcexpr:warn] ' : '[calcexpr:ERROR] ';
  // eslint-disable-next-line no-console
  console[level](prefix + message);
}
