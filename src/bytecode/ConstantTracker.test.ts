import { assert, describe, it } from "@effect/vitest";
import * as Option from "effect/Option";
import { ConstantTracker } from "./ConstantTracker";
import { cancunTable } from "./testUtils";

const op = (opcode: number) => Option.getOrThrow(cancunTable.lookup(opcode));

describe("ConstantTracker", () => {
  it("pops pushed constants and unknowns", () => {
    const tracker = ConstantTracker.empty.pushConstant(7n).pushUnknown();
    assert.strictEqual(tracker.size, 2);

    const [top, rest] = tracker.pop();
    assert.isTrue(Option.isNone(top));
    const [next, empty] = rest.pop();
    assert.deepStrictEqual(next, Option.some(7n));
    assert.strictEqual(empty.size, 0);
  });

  it("returns unknown when popping an empty tracker", () => {
    const [slot, rest] = ConstantTracker.empty.pop();
    assert.isTrue(Option.isNone(slot));
    assert.strictEqual(rest.size, 0);
  });

  it("never mutates an existing tracker", () => {
    const base = ConstantTracker.empty.pushConstant(1n);
    const branch = base.pushConstant(2n);
    assert.strictEqual(base.size, 1);
    assert.deepStrictEqual(base.peek(0), Option.some(1n));
    assert.deepStrictEqual(branch.peek(0), Option.some(2n));
  });

  it("copies slots with DUP", () => {
    const tracker = ConstantTracker.empty
      .pushConstant(1n)
      .pushUnknown()
      .pushConstant(3n)
      .apply(op(0x82), 0n);
    assert.strictEqual(tracker.size, 4);
    assert.deepStrictEqual(tracker.peek(0), Option.some(1n));
  });

  it("exchanges slots with SWAP", () => {
    const tracker = ConstantTracker.empty
      .pushConstant(1n)
      .pushConstant(2n)
      .pushUnknown()
      .apply(op(0x91), 0n);
    assert.deepStrictEqual(tracker.toArray(), [
      Option.some(1n),
      Option.some(2n),
      Option.none(),
    ]);
  });

  it("records push immediates", () => {
    const tracker = ConstantTracker.empty.apply(op(0x61), 0x1234n);
    assert.deepStrictEqual(tracker.peek(0), Option.some(0x1234n));
  });

  it("collapses arithmetic results to unknown", () => {
    const tracker = ConstantTracker.empty
      .pushConstant(9n)
      .pushConstant(2n)
      .pushConstant(3n)
      .apply(op(0x01), 0n);
    assert.deepStrictEqual(tracker.toArray(), [Option.none(), Option.some(9n)]);
  });

  it("drops consumed slots for instructions without outputs", () => {
    const tracker = ConstantTracker.empty
      .pushConstant(1n)
      .pushConstant(2n)
      .pushConstant(3n)
      .apply(op(0x52), 0n);
    assert.deepStrictEqual(tracker.toArray(), [Option.some(1n)]);
    assert.deepStrictEqual(tracker.apply(op(0x50), 0n).toArray(), []);
  });
});
