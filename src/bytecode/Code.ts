import * as Data from "effect/Data";
import * as Effect from "effect/Effect";
import * as Schema from "effect/Schema";
import { Hex } from "voltaire-effect/primitives";

const JUMPDEST = 0x5b;
const PUSH1 = 0x60;
const PUSH32 = 0x7f;

/** Error raised when hex input cannot be decoded into code bytes. */
export class InvalidCodeHexError extends Data.TaggedError(
  "InvalidCodeHexError",
)<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

/** Even-length hex string, with or without a `0x` prefix. */
export const CodeHexSchema = Schema.String.pipe(
  Schema.pattern(/^(0x)?([0-9a-fA-F]{2})*$/),
);

/**
 * Immutable code bytes plus the set of offsets that hold a JUMPDEST
 * instruction (as opposed to a 0x5b byte inside push data).
 */
export class Code {
  readonly #bytes: Uint8Array;
  readonly #jumpDests: Uint8Array;

  constructor(bytes: Uint8Array) {
    this.#bytes = bytes.slice();
    this.#jumpDests = analyzeJumpDests(this.#bytes);
  }

  get length(): number {
    return this.#bytes.length;
  }

  /** Byte at `pc`, or undefined outside the code. */
  at(pc: number): number | undefined {
    return pc >= 0 && pc < this.#bytes.length ? this.#bytes[pc] : undefined;
  }

  isJumpDest(pc: number): boolean {
    return pc >= 0 && pc < this.#jumpDests.length && this.#jumpDests[pc] === 1;
  }

  /** Copy of the underlying bytes. */
  toBytes(): Uint8Array {
    return this.#bytes.slice();
  }
}

const analyzeJumpDests = (bytes: Uint8Array): Uint8Array => {
  const jumpDests = new Uint8Array(bytes.length);
  let pc = 0;
  while (pc < bytes.length) {
    const opcode = bytes[pc] ?? 0;
    if (opcode === JUMPDEST) {
      jumpDests[pc] = 1;
    }
    pc += opcode >= PUSH1 && opcode <= PUSH32 ? opcode - PUSH1 + 2 : 1;
  }
  return jumpDests;
};

const invalidCodeHex = (cause: unknown) =>
  new InvalidCodeHexError({
    message: "Code must be an even-length hex string",
    cause,
  });

/** Decode hex text (whitespace ignored) into code. */
export const codeFromHex = (
  hex: string,
): Effect.Effect<Code, InvalidCodeHexError> =>
  Schema.decode(CodeHexSchema)(hex.replace(/\s+/g, "")).pipe(
    Effect.mapError(invalidCodeHex),
    Effect.flatMap((validated) =>
      Effect.try({
        try: () =>
          Hex.toBytes(validated.startsWith("0x") ? validated : `0x${validated}`),
        catch: invalidCodeHex,
      }),
    ),
    Effect.map((bytes) => new Code(Uint8Array.from(bytes))),
  );
