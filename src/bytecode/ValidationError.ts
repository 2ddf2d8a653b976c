import * as Data from "effect/Data";

/** An opcode byte with no descriptor in the active instruction table was reached. */
export class InvalidInstructionError extends Data.TaggedError(
  "InvalidInstructionError",
)<{
  readonly pc: number;
  readonly opcode: number;
}> {}

/** Immediate data, or a path, ran past the end of the code. */
export class CodeTruncatedError extends Data.TaggedError("CodeTruncatedError")<{
  readonly pc: number;
  readonly codeLength: number;
}> {}

/** A jump whose destination is not a literal constant. */
export class UnresolvedDynamicJumpError extends Data.TaggedError(
  "UnresolvedDynamicJumpError",
)<{
  readonly pc: number;
}> {}

/** A constant jump destination that is not a JUMPDEST instruction. */
export class InvalidJumpDestinationError extends Data.TaggedError(
  "InvalidJumpDestinationError",
)<{
  readonly pc: number;
  readonly destination: bigint;
}> {}

/** Fewer items on the stack than an instruction or block exit requires. */
export class StackUnderflowError extends Data.TaggedError("StackUnderflowError")<{
  readonly pc: number;
  readonly required: number;
  readonly available: number;
}> {}

/** The stack would grow past its limit. */
export class StackOverflowError extends Data.TaggedError("StackOverflowError")<{
  readonly pc: number;
  readonly limit: number;
  readonly resulting: number;
}> {}

/** Union of static control-flow validation errors. */
export type ValidationError =
  | InvalidInstructionError
  | CodeTruncatedError
  | UnresolvedDynamicJumpError
  | InvalidJumpDestinationError
  | StackUnderflowError
  | StackOverflowError;

const hexByte = (value: number) => `0x${value.toString(16).padStart(2, "0")}`;

const describe = (error: ValidationError): string => {
  switch (error._tag) {
    case "InvalidInstructionError":
      return `opcode ${hexByte(error.opcode)} is not defined`;
    case "CodeTruncatedError":
      return `code ends at ${error.codeLength}`;
    case "UnresolvedDynamicJumpError":
      return "jump destination is not a constant";
    case "InvalidJumpDestinationError":
      return `destination ${error.destination} is not a JUMPDEST`;
    case "StackUnderflowError":
      return `requires ${error.required} items, ${error.available} available`;
    case "StackOverflowError":
      return `stack would hold ${error.resulting} items, limit ${error.limit}`;
  }
};

/** One-line diagnostic: `<Kind> at pc <n>: <detail>`. */
export const formatValidationError = (error: ValidationError): string =>
  `${error._tag.replace(/Error$/, "")} at pc ${error.pc}: ${describe(error)}`;
