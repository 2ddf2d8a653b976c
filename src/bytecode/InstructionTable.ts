import * as Context from "effect/Context";
import * as Effect from "effect/Effect";
import * as Either from "effect/Either";
import * as Layer from "effect/Layer";
import * as Option from "effect/Option";
import * as Schema from "effect/Schema";
import { Hardfork } from "voltaire-effect/primitives";
import {
  HardforkNameSchema,
  ReleaseSpec,
  ReleaseSpecCancun,
  type ReleaseSpecService,
  toHardfork,
} from "../evm/ReleaseSpec";
import type { Code } from "./Code";
import opcodesJson from "./opcodes.json";
import { CodeTruncatedError, InvalidInstructionError } from "./ValidationError";

/**
 * How an instruction moves stack items. `push`, `dup`, `swap` and `pop`
 * are the only kinds that preserve or create tracked constants.
 */
export const InstructionKinds = [
  "plain",
  "push",
  "dup",
  "swap",
  "pop",
  "jump",
  "jumpi",
  "jumpdest",
  "terminal",
] as const;

export type InstructionKind = (typeof InstructionKinds)[number];

const OpcodeByteSchema = Schema.transform(
  Schema.String.pipe(Schema.pattern(/^0x[0-9a-f]{2}$/)),
  Schema.Number,
  {
    strict: true,
    decode: (hex) => Number.parseInt(hex.slice(2), 16),
    encode: (byte) => `0x${byte.toString(16).padStart(2, "0")}`,
  },
);

const StackCountSchema = Schema.Number.pipe(
  Schema.int(),
  Schema.between(0, 17),
);

/** Schema for one entry of `opcodes.json`. */
export const OpcodeEntrySchema = Schema.Struct({
  opcode: OpcodeByteSchema,
  name: Schema.String,
  consumes: StackCountSchema,
  produces: StackCountSchema,
  immediate: Schema.Number.pipe(Schema.int(), Schema.between(0, 32)),
  kind: Schema.Literal(...InstructionKinds),
  since: HardforkNameSchema,
});

export type OpcodeEntry = Schema.Schema.Type<typeof OpcodeEntrySchema>;

const opcodeEntries: ReadonlyArray<OpcodeEntry> = Schema.decodeUnknownSync(
  Schema.Array(OpcodeEntrySchema),
)(opcodesJson);

/** Static metadata for one opcode. */
export interface InstructionDescriptor {
  readonly opcode: number;
  readonly name: string;
  readonly consumes: number;
  readonly produces: number;
  readonly producesConstant: boolean;
  readonly immediateLength: number;
  readonly terminal: boolean;
  readonly kind: InstructionKind;
}

/** Instruction table for one release spec. */
export interface InstructionTableService {
  readonly hardfork: Hardfork.HardforkType;
  readonly lookup: (opcode: number) => Option.Option<InstructionDescriptor>;
  readonly descriptors: () => ReadonlyArray<InstructionDescriptor>;
}

/** Context tag for the instruction table. */
export class InstructionTable extends Context.Tag("InstructionTable")<
  InstructionTable,
  InstructionTableService
>() {}

const toDescriptor = (entry: OpcodeEntry): InstructionDescriptor => ({
  opcode: entry.opcode,
  name: entry.name,
  consumes: entry.consumes,
  produces: entry.produces,
  producesConstant: entry.kind === "push",
  immediateLength: entry.immediate,
  terminal: entry.kind === "terminal",
  kind: entry.kind,
});

const isEnabled = (entry: OpcodeEntry, spec: ReleaseSpecService): boolean =>
  entry.name === "PUSH0"
    ? spec.isEip3855Enabled
    : Hardfork.isAtLeast(spec.hardfork, toHardfork(entry.since));

/** Build the 256-slot instruction table active under `spec`. */
export const makeInstructionTable = (
  spec: ReleaseSpecService,
): InstructionTableService => {
  const slots: Array<InstructionDescriptor | undefined> = new Array(256);
  for (const entry of opcodeEntries) {
    if (isEnabled(entry, spec)) {
      slots[entry.opcode] = toDescriptor(entry);
    }
  }
  const descriptors = slots.filter(
    (slot): slot is InstructionDescriptor => slot !== undefined,
  );

  return {
    hardfork: spec.hardfork,
    lookup: (opcode) => Option.fromNullable(slots[opcode]),
    descriptors: () => descriptors,
  } satisfies InstructionTableService;
};

/** Decode the instruction at `pc`, failing on bytes with no descriptor. */
export const decodeInstruction = (
  table: InstructionTableService,
  code: Code,
  pc: number,
): Either.Either<InstructionDescriptor, InvalidInstructionError> => {
  const opcode = code.at(pc) ?? 0;
  return Option.match(table.lookup(opcode), {
    onNone: () => Either.left(new InvalidInstructionError({ pc, opcode })),
    onSome: (descriptor) => Either.right(descriptor),
  });
};

/** Offset of the next instruction, skipping immediate data. */
export const advance = (pc: number, descriptor: InstructionDescriptor): number =>
  pc + 1 + descriptor.immediateLength;

/** Big-endian literal following a push opcode (0 for PUSH0). */
export const immediateValue = (
  code: Code,
  pc: number,
  descriptor: InstructionDescriptor,
): Either.Either<bigint, CodeTruncatedError> => {
  if (advance(pc, descriptor) > code.length) {
    return Either.left(new CodeTruncatedError({ pc, codeLength: code.length }));
  }
  let value = 0n;
  for (let offset = 1; offset <= descriptor.immediateLength; offset += 1) {
    value = (value << 8n) | BigInt(code.at(pc + offset) ?? 0);
  }
  return Either.right(value);
};

/** Production layer, built from the active release spec. */
export const InstructionTableLive: Layer.Layer<
  InstructionTable,
  never,
  ReleaseSpec
> = Layer.effect(InstructionTable, Effect.map(ReleaseSpec, makeInstructionTable));

/** Cancun instruction table for tests. */
export const InstructionTableTest: Layer.Layer<InstructionTable> =
  InstructionTableLive.pipe(Layer.provide(ReleaseSpecCancun));

/** Look up an opcode in the active table. */
export const lookupInstruction = (opcode: number) =>
  Effect.map(InstructionTable, (table) => table.lookup(opcode));
