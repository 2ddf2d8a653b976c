import { assert, describe, it } from "@effect/vitest";
import * as Effect from "effect/Effect";
import * as Either from "effect/Either";
import * as Option from "effect/Option";
import { Hardfork } from "voltaire-effect/primitives";
import { makeReleaseSpec } from "../evm/ReleaseSpec";
import { Code } from "./Code";
import {
  advance,
  decodeInstruction,
  immediateValue,
  InstructionTableTest,
  lookupInstruction,
  makeInstructionTable,
} from "./InstructionTable";
import { cancunTable } from "./testUtils";
import { CodeTruncatedError, InvalidInstructionError } from "./ValidationError";

const descriptor = (opcode: number) =>
  Option.getOrThrow(cancunTable.lookup(opcode));

describe("InstructionTable", () => {
  it("describes stack effects", () => {
    const add = descriptor(0x01);
    assert.strictEqual(add.name, "ADD");
    assert.strictEqual(add.consumes, 2);
    assert.strictEqual(add.produces, 1);
    assert.isFalse(add.producesConstant);

    const dup3 = descriptor(0x82);
    assert.strictEqual(dup3.name, "DUP3");
    assert.strictEqual(dup3.consumes, 3);
    assert.strictEqual(dup3.produces, 4);
    assert.strictEqual(dup3.kind, "dup");

    const swap16 = descriptor(0x9f);
    assert.strictEqual(swap16.consumes, 17);
    assert.strictEqual(swap16.produces, 17);
  });

  it("marks pushes as constant producers with immediate data", () => {
    const push1 = descriptor(0x60);
    const push32 = descriptor(0x7f);
    assert.isTrue(push1.producesConstant);
    assert.strictEqual(push1.immediateLength, 1);
    assert.strictEqual(push32.immediateLength, 32);
    assert.strictEqual(descriptor(0x5f).immediateLength, 0);
  });

  it("marks normal halts as terminal", () => {
    const terminal = cancunTable
      .descriptors()
      .filter((entry) => entry.terminal)
      .map((entry) => entry.name);
    assert.deepStrictEqual(terminal, ["STOP", "RETURN", "REVERT", "SELFDESTRUCT"]);
  });

  it("leaves INVALID and unassigned bytes undefined", () => {
    assert.isTrue(Option.isNone(cancunTable.lookup(0xfe)));
    assert.isTrue(Option.isNone(cancunTable.lookup(0x0c)));
    assert.isTrue(Option.isNone(cancunTable.lookup(0xef)));
  });

  it("gates opcodes by hardfork", () => {
    const frontier = makeInstructionTable(makeReleaseSpec(Hardfork.FRONTIER));
    assert.isTrue(Option.isNone(frontier.lookup(0xf4)));
    assert.isTrue(Option.isNone(frontier.lookup(0xfd)));
    assert.isTrue(Option.isNone(frontier.lookup(0x1b)));
    assert.isTrue(Option.isSome(frontier.lookup(0xf1)));

    const homestead = makeInstructionTable(makeReleaseSpec(Hardfork.HOMESTEAD));
    assert.isTrue(Option.isSome(homestead.lookup(0xf4)));

    const london = makeInstructionTable(makeReleaseSpec(Hardfork.LONDON));
    assert.isTrue(Option.isSome(london.lookup(0x48)));
    assert.isTrue(Option.isNone(london.lookup(0x5f)));
    assert.isTrue(Option.isNone(london.lookup(0x5c)));
    assert.strictEqual(cancunTable.descriptors().length, 148);
  });

  it("lets the release spec switch PUSH0 off", () => {
    const table = makeInstructionTable(
      makeReleaseSpec(Hardfork.CANCUN, { isEip3855Enabled: false }),
    );
    assert.isTrue(Option.isNone(table.lookup(0x5f)));
    assert.isTrue(Option.isSome(table.lookup(0x5e)));
  });

  it("advances past immediate data", () => {
    assert.strictEqual(advance(10, descriptor(0x01)), 11);
    assert.strictEqual(advance(10, descriptor(0x61)), 13);
  });

  it("decodes big-endian immediates", () => {
    const code = new Code(new Uint8Array([0x62, 0x01, 0x02, 0x03]));
    const value = immediateValue(code, 0, descriptor(0x62));
    assert.deepStrictEqual(value, Either.right(0x010203n));
  });

  it("reports immediates that run past the end", () => {
    const code = new Code(new Uint8Array([0x00, 0x62, 0x01]));
    const value = immediateValue(code, 1, descriptor(0x62));
    assert.isTrue(Either.isLeft(value));
    if (Either.isLeft(value)) {
      assert.instanceOf(value.left, CodeTruncatedError);
      assert.strictEqual(value.left.pc, 1);
      assert.strictEqual(value.left.codeLength, 3);
    }
  });

  it("fails to decode undefined opcodes", () => {
    const code = new Code(new Uint8Array([0x00, 0xfe]));
    const decoded = decodeInstruction(cancunTable, code, 1);
    assert.isTrue(Either.isLeft(decoded));
    if (Either.isLeft(decoded)) {
      assert.instanceOf(decoded.left, InvalidInstructionError);
      assert.strictEqual(decoded.left.opcode, 0xfe);
      assert.strictEqual(decoded.left.pc, 1);
    }
  });

  it.effect("serves lookups through the service layer", () =>
    Effect.gen(function* () {
      const jump = yield* lookupInstruction(0x56);
      assert.strictEqual(Option.getOrThrow(jump).kind, "jump");
      const invalid = yield* lookupInstruction(0xfe);
      assert.isTrue(Option.isNone(invalid));
    }).pipe(Effect.provide(InstructionTableTest)),
  );
});
