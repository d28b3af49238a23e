/**
 * Logger accepted by the detector and monitor.
 *
 * Hosts pass their own; otherwise messages go to the console.
 */

export interface Logger {
  debug?: (msg: string) => void;
  info?: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
}

const PREFIX = '[cluely-watch]';

export const consoleLogger: Logger = {
  info: (msg) => console.info(`${PREFIX} ${msg}`),
  warn: (msg) => console.warn(`${PREFIX} ${msg}`),
  error: (msg) => console.error(`${PREFIX} ${msg}`),
};

export const silentLogger: Logger = {
  warn: () => {},
  error: () => {},
};
