import { MazeParseError, cellAt, type CellKind, isMazeParseError, isTraversable, parseMaze } from "../src";
import { fixture } from "./fixtures";

function parseFailure(text: string): MazeParseError {
  try {
    parseMaze(text);
  } catch (err) {
    if (isMazeParseError(err)) return err;
    throw err;
  }
  throw new Error("expected parseMaze to fail");
}

describe("parseMaze", () => {
  it("reads dimensions and markers", () => {
    const { grid, start, end } = parseMaze(fixture("sample"));
    expect([grid.rows, grid.cols]).toEqual([5, 7]);
    expect(start).toEqual({ row: 1, col: 1 });
    expect(end).toEqual({ row: 2, col: 4 });
  });

  it("classifies every cell", () => {
    const { grid } = parseMaze(fixture("sample"));
    expect(cellAt(grid, { row: 0, col: 0 })).toBe("wall");
    expect(cellAt(grid, { row: 1, col: 2 })).toBe("free");
    expect(cellAt(grid, { row: 1, col: 1 })).toBe("start");
    expect(cellAt(grid, { row: 2, col: 4 })).toBe("end");
    expect(cellAt(grid, { row: 5, col: 0 })).toBeUndefined();
  });

  it("treats start and end as traversable", () => {
    const open: CellKind[] = ["free", "start", "end"];
    expect(open.every(kind => isTraversable(kind))).toBe(true);
    expect(isTraversable("wall")).toBe(false);
    expect(isTraversable(undefined)).toBe(false);
  });

  it("is idempotent", () => {
    expect(parseMaze(fixture("spiral"))).toEqual(parseMaze(fixture("spiral")));
  });

  it("returns a frozen grid", () => {
    const { grid } = parseMaze("SE");
    expect(Object.isFrozen(grid)).toBe(true);
    expect(Object.isFrozen(grid.cells)).toBe(true);
  });

  it("accepts CRLF rows and drops surrounding blank lines", () => {
    const { grid, end } = parseMaze("\r\n\nS E\r\n###\r\n\n");
    expect([grid.rows, grid.cols]).toEqual([2, 3]);
    expect(end).toEqual({ row: 0, col: 2 });
  });

  it("keeps leading spaces of the first row", () => {
    const { grid, start } = parseMaze(" SE\n###");
    expect(grid.cols).toBe(3);
    expect(start).toEqual({ row: 0, col: 1 });
  });

  it.each(["", "   ", " \n\t\n "])("rejects blank input %j", text => {
    const err = parseFailure(text);
    expect(err.kind).toBe("EmptyInput");
    expect(err.context).toEqual({});
  });

  it("rejects rows of differing length", () => {
    const err = parseFailure("#\n##");
    expect(err).toBeInstanceOf(MazeParseError);
    expect(err.kind).toBe("MalformedGrid");
    expect(err.context).toEqual({ row: 1, expected: 1, actual: 2 });
    expect(err.message).toBe("Row 2 has inconsistent length. Expected: 1, got: 2.");
  });

  it("checks a row's length before its characters", () => {
    expect(parseFailure("S E\n#.##").kind).toBe("MalformedGrid");
  });

  it("rejects characters outside the alphabet", () => {
    const err = parseFailure("S.E");
    expect(err.kind).toBe("InvalidCharacter");
    expect(err.context).toEqual({ row: 0, col: 1, char: "." });
    expect(err.message).toBe("Invalid character '.' at (0,1). Use only 'S', 'E', '#', ' '.");
  });

  it("reports a missing start", () => {
    const err = parseFailure("# E");
    expect(err.kind).toBe("MissingStart");
    expect(err.context).toEqual({ count: 0 });
  });

  it("reports a missing end", () => {
    const err = parseFailure("S  \n###");
    expect(err.kind).toBe("MissingEnd");
    expect(err.message).toBe("End point 'E' not found in maze.");
  });

  it("rejects duplicate markers", () => {
    const start = parseFailure("SSE");
    expect(start.kind).toBe("MissingStart");
    expect(start.context).toEqual({ count: 2 });
    expect(start.message).toBe("Start point 'S' found 2 times; expected exactly one.");
    expect(parseFailure("SEE").context).toEqual({ count: 2 });
  });
});
