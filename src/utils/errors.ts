export type CutListErrorKind = "config" | "parse" | "io";

export class CutListError extends Error {
  readonly kind: CutListErrorKind;

  constructor(kind: CutListErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

/** Invalid run parameters or an unreadable source script. */
export class ConfigError extends CutListError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("config", message, options);
  }
}

export class ParseError extends CutListError {
  /** 1-based source line */
  readonly line?: number;
  /** 1-based range entry */
  readonly entry?: number;

  constructor(message: string, position: { line?: number; entry?: number } = {}) {
    const where = [
      position.line != null ? `line ${position.line}` : null,
      position.entry != null ? `entry ${position.entry}` : null,
    ]
      .filter((p): p is string => p !== null)
      .join(", ");
    super("parse", where ? `${message} (${where})` : message);
    this.line = position.line;
    this.entry = position.entry;
  }
}

export class IOError extends CutListError {
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super("io", message, options);
    this.path = path;
  }
}
