import { assert } from "@effect/vitest";
import * as Option from "effect/Option";
import { Hardfork } from "voltaire-effect/primitives";
import { makeReleaseSpec } from "../evm/ReleaseSpec";
import { Code } from "./Code";
import {
  type InstructionDescriptor,
  type InstructionTableService,
  makeInstructionTable,
} from "./InstructionTable";
import type { ValidationError } from "./ValidationError";

export const cancunTable: InstructionTableService = makeInstructionTable(
  makeReleaseSpec(Hardfork.CANCUN),
);

const byName = new Map<string, InstructionDescriptor>(
  cancunTable.descriptors().map((descriptor) => [descriptor.name, descriptor]),
);

const immediateBytes = (hex: string, length: number): Array<number> => {
  const digits = hex.replace(/^0x/, "").padStart(length * 2, "0");
  return Array.from({ length }, (_, i) =>
    Number.parseInt(digits.slice(i * 2, i * 2 + 2), 16),
  );
};

/**
 * Assemble mnemonics into raw bytes. `"PUSH1 0x05"` takes its immediate
 * from the second token; `"RAW 0xfe"` emits a byte as-is.
 */
export const assembleBytes = (...lines: ReadonlyArray<string>): Uint8Array => {
  const out: Array<number> = [];
  for (const line of lines) {
    const [mnemonic = "", operand = "0x00"] = line.trim().split(/\s+/);
    if (mnemonic === "RAW") {
      out.push(Number.parseInt(operand, 16));
      continue;
    }
    const descriptor = byName.get(mnemonic);
    if (descriptor === undefined) {
      throw new Error(`Unknown mnemonic ${mnemonic}`);
    }
    out.push(descriptor.opcode);
    out.push(...immediateBytes(operand, descriptor.immediateLength));
  }
  return Uint8Array.from(out);
};

export const assemble = (...lines: ReadonlyArray<string>): Code =>
  new Code(assembleBytes(...lines));

/** Ways a concrete run can end. */
export type Halt =
  | "stop"
  | "stepLimit"
  | "invalidInstruction"
  | "invalidJump"
  | "stackUnderflow"
  | "stackOverflow";

/** Seeded generator of integers in `[0, bound)`. */
export const makeRandom = (seed: number) => {
  let state = seed >>> 0;
  return (bound: number): number => {
    state = (Math.imul(state, 1_103_515_245) + 12_345) >>> 0;
    return (state >>> 16) % bound;
  };
};

/** Deterministic stand-in for environment values (calldata, balances, ...). */
export const makeValueSource = (seed: number) => {
  const random = makeRandom(seed);
  return (): bigint => BigInt(random(3));
};

const pick = <A>(random: (bound: number) => number, items: ReadonlyArray<A>) =>
  items[random(items.length)];

const fuzzDescriptors = cancunTable
  .descriptors()
  .filter((descriptor) => descriptor.consumes <= 3);
const fuzzPushes = fuzzDescriptors.filter((d) => d.kind === "push");
const fuzzShuffles = fuzzDescriptors.filter(
  (d) => d.kind === "dup" || d.kind === "swap" || d.kind === "pop",
);
const fuzzPlain = fuzzDescriptors.filter((d) => d.kind === "plain");

type BlockEnding =
  | Readonly<{ kind: "JUMP" | "JUMPI"; target: number }>
  | Readonly<{ kind: "STOP" | "fallthrough" }>;

const randomBodyLine = (random: (bound: number) => number): string => {
  const roll = random(10);
  const pool =
    roll < 4 ? fuzzPushes : roll < 7 ? fuzzShuffles : fuzzPlain;
  const descriptor = pick(random, pool);
  if (descriptor === undefined) {
    return "JUMPDEST";
  }
  return descriptor.immediateLength > 0
    ? `${descriptor.name} 0x${random(256).toString(16)}`
    : descriptor.name;
};

const endingSize = (ending: BlockEnding): number =>
  ending.kind === "fallthrough" ? 0 : ending.kind === "STOP" ? 1 : 4;

/**
 * Random program made of JUMPDEST-headed blocks. Jumps always take the
 * constant pushed immediately before them, aimed at a block head.
 */
export const randomProgram = (seed: number): ReadonlyArray<string> => {
  const random = makeRandom(seed);
  const blockCount = 1 + random(4);
  const blocks = Array.from({ length: blockCount }, () => {
    const body = Array.from({ length: random(7) }, () => randomBodyLine(random));
    const roll = random(4);
    const ending: BlockEnding =
      roll < 2
        ? { kind: roll === 0 ? "JUMP" : "JUMPI", target: random(blockCount) }
        : { kind: roll === 2 ? "STOP" : "fallthrough" };
    return { body, ending };
  });

  const offsets: Array<number> = [];
  let offset = 0;
  for (const block of blocks) {
    offsets.push(offset);
    offset +=
      1 + assembleBytes(...block.body).length + endingSize(block.ending);
  }

  return blocks.flatMap(({ body, ending }) => {
    switch (ending.kind) {
      case "JUMP":
      case "JUMPI":
        return [
          "JUMPDEST",
          ...body,
          `PUSH2 0x${(offsets[ending.target] ?? 0).toString(16)}`,
          ending.kind,
        ];
      case "STOP":
        return ["JUMPDEST", ...body, "STOP"];
      case "fallthrough":
        return ["JUMPDEST", ...body];
    }
  });
};

/**
 * Minimal concrete interpreter. Arithmetic is not modelled: every plain
 * instruction produces values from `nextValue`.
 */
export const execute = (
  table: InstructionTableService,
  code: Code,
  nextValue: () => bigint,
  maxSteps = 10_000,
): Halt => {
  const stack: Array<bigint> = [];
  const pop = (): bigint => stack.pop() ?? 0n;
  let pc = 0;

  for (let step = 0; step < maxSteps; step += 1) {
    if (pc >= code.length) {
      return "stop";
    }
    const found = table.lookup(code.at(pc) ?? 0);
    if (Option.isNone(found)) {
      return "invalidInstruction";
    }
    const descriptor = found.value;
    if (stack.length < descriptor.consumes) {
      return "stackUnderflow";
    }
    if (stack.length - descriptor.consumes + descriptor.produces > 1024) {
      return "stackOverflow";
    }

    let next = pc + 1 + descriptor.immediateLength;
    switch (descriptor.kind) {
      case "push": {
        let value = 0n;
        for (let i = 1; i <= descriptor.immediateLength; i += 1) {
          value = (value << 8n) | BigInt(code.at(pc + i) ?? 0);
        }
        stack.push(value);
        break;
      }
      case "dup":
        stack.push(stack[stack.length - descriptor.consumes] ?? 0n);
        break;
      case "swap": {
        const top = stack.length - 1;
        const other = top - (descriptor.consumes - 1);
        const value = stack[top] ?? 0n;
        stack[top] = stack[other] ?? 0n;
        stack[other] = value;
        break;
      }
      case "pop":
        pop();
        break;
      case "jump":
      case "jumpi": {
        const destination = pop();
        const taken = descriptor.kind === "jump" || pop() !== 0n;
        if (taken) {
          if (
            destination >= BigInt(code.length) ||
            !code.isJumpDest(Number(destination))
          ) {
            return "invalidJump";
          }
          next = Number(destination);
        }
        break;
      }
      case "terminal":
        return "stop";
      case "jumpdest":
        break;
      case "plain":
        for (let i = 0; i < descriptor.consumes; i += 1) {
          pop();
        }
        for (let i = 0; i < descriptor.produces; i += 1) {
          stack.push(nextValue());
        }
        break;
    }
    pc = next;
  }
  return "stepLimit";
};

/** Compare tagged errors field by field (chai compares Errors by message only). */
export const assertValidationError = (
  actual: ValidationError,
  expected: ValidationError,
) => {
  assert.strictEqual(actual._tag, expected._tag);
  assert.deepStrictEqual({ ...actual }, { ...expected });
};
