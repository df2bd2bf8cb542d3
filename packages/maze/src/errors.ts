/** Parse failure kinds, each with the context needed to diagnose it. */
export type MazeParseErrorContext = {
  EmptyInput: Record<string, never>;
  MalformedGrid: { row: number; expected: number; actual: number };
  InvalidCharacter: { row: number; col: number; char: string };
  MissingStart: { count: number };
  MissingEnd: { count: number };
};
export type MazeParseErrorKind = keyof MazeParseErrorContext;

export class MazeParseError<K extends MazeParseErrorKind = MazeParseErrorKind> extends Error {
  override name = "MazeParseError";

  constructor(public readonly kind: K, public readonly context: MazeParseErrorContext[K], message: string) {
    super(message);
  }
}

export function isMazeParseError(err: unknown): err is MazeParseError {
  return err instanceof MazeParseError;
}
