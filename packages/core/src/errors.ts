/**
 * Base class for errors caused by the caller's input (as opposed to bugs).
 */
export class MoiraError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Raised for key, note and scale names or scale offsets that cannot be read. */
export class InvalidNotationError extends MoiraError {}

/**
 * Raised while reading a JSON piece. `path` points at the offending value,
 * e.g. `tracks[1].notes[4]`; it is empty for errors about the whole document.
 */
export class PieceFormatError extends MoiraError {
  readonly path: string;

  constructor(path: string, message: string) {
    super(path ? `${path}: ${message}` : message);
    this.path = path;
  }
}
