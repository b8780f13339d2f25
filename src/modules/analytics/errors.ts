/**
 * Error types raised outside the engine (file input, configuration, CLI args).
 *
 * The engine itself reports data conditions as values, never as exceptions.
 */

export class SeriesFormatError extends Error {
  constructor(
    message: string,
    readonly source: string,
    readonly row?: number
  ) {
    super(row === undefined ? `${source}: ${message}` : `${source} (row ${row}): ${message}`);
    this.name = 'SeriesFormatError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
