import createDebug from 'debug';

/**
 * Minimal logging surface accepted by every component.
 * Hosts may inject their own implementation.
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Create a logger backed by `debug` under the `lanlink:<component>` namespace.
 * Enable with e.g. `DEBUG=lanlink:*`; warnings and errors use `:warn` and
 * `:error` sub-namespaces so they can be enabled on their own.
 */
export function createLogger(component: string): Logger {
  const base = createDebug(`lanlink:${component}`);
  const warn = createDebug(`lanlink:${component}:warn`);
  const error = createDebug(`lanlink:${component}:error`);

  return {
    debug: (message) => base(message),
    info: (message) => base(message),
    warn: (message) => warn(message),
    error: (message) => error(message),
  };
}

/**
 * Logger that discards everything.
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
