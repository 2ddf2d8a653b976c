import * as Context from "effect/Context";
import * as Effect from "effect/Effect";
import * as Either from "effect/Either";
import * as Layer from "effect/Layer";
import * as Option from "effect/Option";
import { ReleaseSpec, ReleaseSpecCancun } from "../evm/ReleaseSpec";
import type { Code } from "./Code";
import { ConstantTracker, type TrackedSlot } from "./ConstantTracker";
import {
  advance,
  decodeInstruction,
  immediateValue,
  InstructionTable,
  InstructionTableLive,
  type InstructionTableService,
} from "./InstructionTable";
import {
  CodeTruncatedError,
  formatValidationError,
  InvalidJumpDestinationError,
  StackOverflowError,
  StackUnderflowError,
  UnresolvedDynamicJumpError,
  type ValidationError,
} from "./ValidationError";

/** Summary of a successful validation run. */
export interface ValidationReport {
  readonly codeLength: number;
  readonly instructionsVisited: number;
  readonly pathsExplored: number;
  readonly maxStackHeight: number;
  /** Jump targets reached, ascending. */
  readonly jumpDestinations: ReadonlyArray<number>;
  /** Stack depth relative to the enclosing block's base, per visited pc. */
  readonly entryDepths: ReadonlyMap<number, number>;
}

/** Validator behavior knobs that are not part of the release spec. */
export interface ControlFlowValidatorOptions {
  /** Reject paths that fall off the end of code instead of stopping there. */
  readonly strictCodeEnd?: boolean;
}

/** Static control-flow validator service. */
export interface ControlFlowValidatorService {
  readonly validate: (code: Code) => Effect.Effect<void, ValidationError>;
  readonly analyze: (
    code: Code,
  ) => Effect.Effect<ValidationReport, ValidationError>;
}

/** Context tag for the control-flow validator. */
export class ControlFlowValidator extends Context.Tag("ControlFlowValidator")<
  ControlFlowValidator,
  ControlFlowValidatorService
>() {}

type PathState = {
  readonly pc: number;
  readonly sp: number;
  readonly base: number;
  readonly tracker: ConstantTracker;
};

type WalkLimits = {
  readonly stackLimit: number;
  readonly strictCodeEnd: boolean;
};

type VisitedEntry = {
  /** Stack height relative to the enclosing block's base. */
  readonly depth: number;
  /** Absolute stack height the pc was first walked with. */
  readonly height: number;
};

/**
 * Per-pc entry state. A pc is either unvisited (absent) or visited with the
 * state of its first walk, whose depth may legitimately be zero.
 */
class VisitedTable {
  readonly #entries: Array<VisitedEntry | undefined>;
  #count = 0;

  constructor(codeLength: number) {
    this.#entries = new Array(codeLength);
  }

  get(pc: number): Option.Option<VisitedEntry> {
    return Option.fromNullable(this.#entries[pc]);
  }

  record(pc: number, entry: VisitedEntry): void {
    this.#entries[pc] = entry;
    this.#count += 1;
  }

  get count(): number {
    return this.#count;
  }

  depths(): ReadonlyMap<number, number> {
    const depths = new Map<number, number>();
    this.#entries.forEach((entry, pc) => {
      if (entry !== undefined) {
        depths.set(pc, entry.depth);
      }
    });
    return depths;
  }
}

const resolveDestination = (
  code: Code,
  pc: number,
  slot: TrackedSlot,
): Either.Either<number, ValidationError> => {
  if (Option.isNone(slot)) {
    return Either.left(new UnresolvedDynamicJumpError({ pc }));
  }
  const destination = slot.value;
  if (
    destination >= BigInt(code.length) ||
    !code.isJumpDest(Number(destination))
  ) {
    return Either.left(new InvalidJumpDestinationError({ pc, destination }));
  }
  return Either.right(Number(destination));
};

// Rule 2: a path may only end with at least as many items as its block began with.
const checkExitDepth = (
  pc: number,
  path: Pick<PathState, "sp" | "base">,
): Either.Either<void, StackUnderflowError> =>
  path.sp < path.base
    ? Either.left(
        new StackUnderflowError({
          pc,
          required: path.base,
          available: path.sp,
        }),
      )
    : Either.right(undefined);

/**
 * Depth-first walk over every path from pc 0. Each pc is expanded once;
 * reaching a visited pc ends the path, provided the stack is at least as
 * high as on the first visit. Conditional branches push their
 * taken side onto the worklist and continue with the fallthrough.
 */
export const walkCode = (
  table: InstructionTableService,
  code: Code,
  limits: WalkLimits,
): Either.Either<ValidationReport, ValidationError> => {
  const visited = new VisitedTable(code.length);
  const jumpDestinations = new Set<number>();
  const pending: Array<PathState> = [
    { pc: 0, sp: 0, base: 0, tracker: ConstantTracker.empty },
  ];
  let pathsExplored = 0;
  let maxStackHeight = 0;

  for (let start = pending.pop(); start !== undefined; start = pending.pop()) {
    pathsExplored += 1;
    let { pc, sp, base, tracker } = start;

    for (;;) {
      if (pc >= code.length) {
        if (limits.strictCodeEnd && code.length > 0) {
          return Either.left(
            new CodeTruncatedError({ pc, codeLength: code.length }),
          );
        }
        const exit = checkExitDepth(pc, { sp, base });
        if (Either.isLeft(exit)) {
          return Either.left(exit.left);
        }
        break;
      }

      const decoded = decodeInstruction(table, code, pc);
      if (Either.isLeft(decoded)) {
        return Either.left(decoded.left);
      }
      const descriptor = decoded.right;

      const previous = visited.get(pc);
      if (Option.isSome(previous)) {
        // The first walk from here was checked at its recorded height; a
        // later arrival must bring at least as many items.
        if (sp < previous.value.height) {
          return Either.left(
            new StackUnderflowError({
              pc,
              required: previous.value.height,
              available: sp,
            }),
          );
        }
        break;
      }
      visited.record(pc, { depth: sp - base, height: sp });

      if (sp < descriptor.consumes) {
        return Either.left(
          new StackUnderflowError({
            pc,
            required: descriptor.consumes,
            available: sp,
          }),
        );
      }
      const nextSp = sp - descriptor.consumes + descriptor.produces;
      if (nextSp > limits.stackLimit) {
        return Either.left(
          new StackOverflowError({
            pc,
            limit: limits.stackLimit,
            resulting: nextSp,
          }),
        );
      }

      if (descriptor.kind === "jump" || descriptor.kind === "jumpi") {
        const [slot, afterDestination] = tracker.pop();
        const destination = resolveDestination(code, pc, slot);
        if (Either.isLeft(destination)) {
          return Either.left(destination.left);
        }
        jumpDestinations.add(destination.right);
        sp = nextSp;
        base = sp;
        if (descriptor.kind === "jump") {
          tracker = afterDestination;
          pc = destination.right;
          continue;
        }
        tracker = afterDestination.drop(1);
        pending.push({ pc: destination.right, sp, base, tracker });
        pc = advance(pc, descriptor);
        continue;
      }

      let immediate = 0n;
      if (descriptor.immediateLength > 0) {
        const value = immediateValue(code, pc, descriptor);
        if (Either.isLeft(value)) {
          return Either.left(value.left);
        }
        immediate = value.right;
      }

      tracker = tracker.apply(descriptor, immediate);
      sp = nextSp;
      maxStackHeight = Math.max(maxStackHeight, sp);

      if (descriptor.terminal) {
        const exit = checkExitDepth(pc, { sp, base });
        if (Either.isLeft(exit)) {
          return Either.left(exit.left);
        }
        break;
      }
      pc = advance(pc, descriptor);
    }
  }

  return Either.right({
    codeLength: code.length,
    instructionsVisited: visited.count,
    pathsExplored,
    maxStackHeight,
    jumpDestinations: [...jumpDestinations].sort((a, b) => a - b),
    entryDepths: visited.depths(),
  });
};

const makeControlFlowValidator = (options: ControlFlowValidatorOptions) =>
  Effect.gen(function* () {
    const table = yield* InstructionTable;
    const spec = yield* ReleaseSpec;
    const limits = {
      stackLimit: spec.stackLimit,
      strictCodeEnd: options.strictCodeEnd ?? false,
    } satisfies WalkLimits;

    const walk = (
      code: Code,
    ): Effect.Effect<ValidationReport, ValidationError> =>
      Effect.suspend(() => {
        const result = walkCode(table, code, limits);
        return Either.isLeft(result)
          ? Effect.fail(result.left)
          : Effect.succeed(result.right);
      });

    const analyze = (code: Code) =>
      walk(code).pipe(
        Effect.tap((report) =>
          Effect.logDebug("code accepted").pipe(
            Effect.annotateLogs({
              instructionsVisited: report.instructionsVisited,
              pathsExplored: report.pathsExplored,
            }),
          ),
        ),
        Effect.tapError((error) =>
          Effect.logDebug("code rejected", formatValidationError(error)),
        ),
        Effect.annotateLogs({
          codeLength: code.length,
          hardfork: spec.hardfork,
        }),
      );

    return {
      validate: (code) => Effect.asVoid(analyze(code)),
      analyze,
    } satisfies ControlFlowValidatorService;
  });

/** Production validator layer. */
export const ControlFlowValidatorLive = (
  options: ControlFlowValidatorOptions = {},
): Layer.Layer<ControlFlowValidator, never, InstructionTable | ReleaseSpec> =>
  Layer.effect(ControlFlowValidator, makeControlFlowValidator(options));

/** Cancun validator with its instruction table, for tests. */
export const ControlFlowValidatorTest = (
  options: ControlFlowValidatorOptions = {},
): Layer.Layer<ControlFlowValidator> =>
  ControlFlowValidatorLive(options).pipe(
    Layer.provide(InstructionTableLive),
    Layer.provide(ReleaseSpecCancun),
  );

/** Validate code; fails with the first violation found on any path. */
export const validateCode = (code: Code) =>
  Effect.flatMap(ControlFlowValidator, (validator) => validator.validate(code));

/** Validate code and return the traversal report. */
export const analyzeCode = (code: Code) =>
  Effect.flatMap(ControlFlowValidator, (validator) => validator.analyze(code));
