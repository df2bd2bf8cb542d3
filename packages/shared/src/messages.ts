import { z } from "zod";

/** Wire-level contracts for the solve endpoint. */
export const SolveRequest = z.object({
  maze: z.string(),
  persist: z.boolean().default(true)
});
export type SolveRequest = z.infer<typeof SolveRequest>;

export const ParseErrorKind = z.enum(["EmptyInput", "MalformedGrid", "InvalidCharacter", "MissingStart", "MissingEnd"]);
export type ParseErrorKind = z.infer<typeof ParseErrorKind>;

const Common = {
  requestId: z.string().uuid(),
  elapsedMs: z.number().nonnegative(),
  mazeHash: z.string().length(64),
  artifact: z.string().nullable(), // file name under the output dir, null when not persisted
  output: z.string()
};

export const SolvedResponse = z.object({
  kind: z.literal("Solved"),
  ...Common,
  path: z.array(z.tuple([z.number().int(), z.number().int()])), // [row, col]
  steps: z.number().int().nonnegative(),
  pathHash: z.string().length(64)
});

export const NoPathResponse = z.object({
  kind: z.literal("NoPathFound"),
  ...Common
});

export const ParseErrorResponse = z.object({
  kind: z.literal("ParseError"),
  ...Common,
  error: z.object({
    kind: ParseErrorKind,
    message: z.string(),
    context: z.record(z.union([z.string(), z.number()]))
  })
});

export const SolveResponse = z.discriminatedUnion("kind", [SolvedResponse, NoPathResponse, ParseErrorResponse]);
export type SolveResponse = z.infer<typeof SolveResponse>;

export const ErrorBody = z.object({ error: z.string() });
export type ErrorBody = z.infer<typeof ErrorBody>;
