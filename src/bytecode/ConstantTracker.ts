import * as Option from "effect/Option";
import type { InstructionDescriptor } from "./InstructionTable";

/** A shadow stack slot: the literal it holds, or none when unknown. */
export type TrackedSlot = Option.Option<bigint>;

type Cell = {
  readonly slot: TrackedSlot;
  readonly below: Cell | undefined;
};

/**
 * Shadow of the data stack recording which slots hold literal constants.
 *
 * Instances are immutable; every operation returns a new tracker sharing
 * structure with the old one, so a conditional branch can keep its own copy
 * at no cost. Bounds are enforced by the caller, which tracks the real stack
 * pointer: popping an empty tracker yields an unknown slot.
 */
export class ConstantTracker {
  static readonly empty = new ConstantTracker(undefined, 0);

  private constructor(
    private readonly top: Cell | undefined,
    readonly size: number,
  ) {}

  private push(slot: TrackedSlot): ConstantTracker {
    return new ConstantTracker({ slot, below: this.top }, this.size + 1);
  }

  pushConstant(value: bigint): ConstantTracker {
    return this.push(Option.some(value));
  }

  pushUnknown(): ConstantTracker {
    return this.push(Option.none());
  }

  pop(): readonly [TrackedSlot, ConstantTracker] {
    if (this.top === undefined) {
      return [Option.none(), this];
    }
    return [this.top.slot, new ConstantTracker(this.top.below, this.size - 1)];
  }

  /** Slot `depth` items below the top (0 is the top). */
  peek(depth: number): TrackedSlot {
    let cell = this.top;
    for (let i = 0; i < depth && cell !== undefined; i += 1) {
      cell = cell.below;
    }
    return cell === undefined ? Option.none() : cell.slot;
  }

  /** DUPn: copy the n-th slot onto the top. */
  dup(n: number): ConstantTracker {
    return this.push(this.peek(n - 1));
  }

  /** SWAPn: exchange the top with the slot n below it. */
  swap(n: number): ConstantTracker {
    const lifted: Array<TrackedSlot> = [];
    let rest: ConstantTracker = this;
    for (let i = 0; i <= n; i += 1) {
      const [slot, below] = rest.pop();
      lifted.push(slot);
      rest = below;
    }
    const top = lifted[0];
    const bottom = lifted[n];
    if (top === undefined || bottom === undefined) {
      return this;
    }
    lifted[0] = bottom;
    lifted[n] = top;
    for (let i = lifted.length - 1; i >= 0; i -= 1) {
      rest = rest.push(lifted[i] ?? Option.none());
    }
    return rest;
  }

  /** Drop `count` slots. */
  drop(count: number): ConstantTracker {
    let rest: ConstantTracker = this;
    for (let i = 0; i < count; i += 1) {
      rest = rest.pop()[1];
    }
    return rest;
  }

  /**
   * Mirror one non-jump instruction. Pushes record their literal, stack
   * shuffles keep what they move, and anything else replaces its inputs
   * with unknown outputs.
   */
  apply(descriptor: InstructionDescriptor, immediate: bigint): ConstantTracker {
    switch (descriptor.kind) {
      case "push":
        return this.pushConstant(immediate);
      case "dup":
        return this.dup(descriptor.consumes);
      case "swap":
        return this.swap(descriptor.consumes - 1);
      case "pop":
        return this.drop(1);
      default: {
        let next = this.drop(descriptor.consumes);
        for (let i = 0; i < descriptor.produces; i += 1) {
          next = next.pushUnknown();
        }
        return next;
      }
    }
  }

  /** Slots from top to bottom, for diagnostics. */
  toArray(): ReadonlyArray<TrackedSlot> {
    const slots: Array<TrackedSlot> = [];
    for (let cell = this.top; cell !== undefined; cell = cell.below) {
      slots.push(cell.slot);
    }
    return slots;
  }
}
