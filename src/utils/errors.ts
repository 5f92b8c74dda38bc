export interface ErrorContext {
  character?: string;
  codepoint?: number;
  cellIndex?: number;
  path?: string;
}

/**
 * Base class for every failure the font pipeline reports to its caller.
 */
export class FontgenError extends Error {
  readonly context: ErrorContext;

  constructor(message: string, context: ErrorContext = {}, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.context = context;
  }

  describe(): string {
    const parts: string[] = [];
    if (this.context.character !== undefined) parts.push(`character '${this.context.character}'`);
    if (this.context.codepoint !== undefined) parts.push(`U+${this.context.codepoint.toString(16).toUpperCase().padStart(4, '0')}`);
    if (this.context.cellIndex !== undefined) parts.push(`cell ${this.context.cellIndex}`);
    if (this.context.path !== undefined) parts.push(this.context.path);
    return parts.length > 0 ? `${this.name}: ${this.message} (${parts.join(', ')})` : `${this.name}: ${this.message}`;
  }
}

/** Grid or geometry misconfiguration. Raised before any image work. */
export class LayoutError extends FontgenError {}

/** Source image does not fit the expected grid. */
export class ExtractionError extends FontgenError {}

/** A single cell could not be traced. Never escapes the vectorization adapter. */
export class TracingFailure extends FontgenError {}

/** Font emission failed or the glyph set is incomplete. */
export class AssemblyError extends FontgenError {}

/** Configuration file missing, unreadable or invalid. */
export class ConfigError extends FontgenError {}

export function describeError(error: unknown): string {
  if (error instanceof FontgenError) return error.describe();
  if (error instanceof Error) return error.message;
  return String(error);
}
