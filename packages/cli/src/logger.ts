import { consola } from 'consola';
import type { Logger } from '@convoy/types';

/**
 * Route library logging through consola, tagged per component.
 */
export function createCliLogger(tag: string): Logger {
  const tagged = consola.withTag(tag);
  return {
    info: (msg, ...args) => tagged.info(msg, ...args),
    warn: (msg, ...args) => tagged.warn(msg, ...args),
    error: (msg, ...args) => tagged.error(msg, ...args),
    debug: (msg, ...args) => tagged.debug(msg, ...args),
  };
}

export function enableVerbose(verbose: boolean): void {
  if (verbose) {
    consola.level = 4;
  }
}
