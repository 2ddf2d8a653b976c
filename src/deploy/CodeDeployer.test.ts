import { assert, describe, it } from "@effect/vitest";
import * as Effect from "effect/Effect";
import * as Layer from "effect/Layer";
import * as Option from "effect/Option";
import { Hardfork } from "voltaire-effect/primitives";
import { ControlFlowValidatorLive } from "../bytecode/ControlFlowValidator";
import { InstructionTableLive } from "../bytecode/InstructionTable";
import { assembleBytes } from "../bytecode/testUtils";
import { StackUnderflowError } from "../bytecode/ValidationError";
import { ReleaseSpecLive } from "../evm/ReleaseSpec";
import {
  CodeDeployerLive,
  CodeDeployerTest,
  CodeRejectedError,
  CodeSizeLimitExceededError,
  deployCode,
} from "./CodeDeployer";
import {
  CodeAlreadyDeployedError,
  codeCount,
  CodeStoreTest,
  decodeAddress,
  getCode,
} from "./CodeStore";

const ADDRESS = "0x00000000000000000000000000000000000000bb";

const provideDeployer = <A, E, R>(effect: Effect.Effect<A, E, R>) =>
  effect.pipe(Effect.provide(CodeDeployerTest()));

describe("CodeDeployer", () => {
  it.effect("stores code that passes validation", () =>
    provideDeployer(
      Effect.gen(function* () {
        const address = yield* decodeAddress(ADDRESS);
        const bytes = assembleBytes("PUSH1 0x04", "JUMP", "STOP", "JUMPDEST");
        const deployed = yield* deployCode(address, bytes);

        assert.deepStrictEqual(deployed, { address, size: 5 });
        const stored = yield* getCode(address);
        assert.deepStrictEqual(Option.getOrThrow(stored), bytes);
      }),
    ),
  );

  it.effect("aborts creation without writing when validation fails", () =>
    provideDeployer(
      Effect.gen(function* () {
        const address = yield* decodeAddress(ADDRESS);
        const error = yield* Effect.flip(
          deployCode(address, assembleBytes("POP", "STOP")),
        );

        assert.instanceOf(error, CodeRejectedError);
        assert.strictEqual(error.address, address);
        assert.instanceOf(error.reason, StackUnderflowError);
        assert.strictEqual(error.reason.pc, 0);
        assert.strictEqual(yield* codeCount(), 0);
        assert.isTrue(Option.isNone(yield* getCode(address)));
      }),
    ),
  );

  it.effect("rejects code over the size limit before validating it", () =>
    provideDeployer(
      Effect.gen(function* () {
        const address = yield* decodeAddress(ADDRESS);
        const bytes = new Uint8Array(24_577);
        const error = yield* Effect.flip(deployCode(address, bytes));

        assert.instanceOf(error, CodeSizeLimitExceededError);
        assert.strictEqual(error.size, 24_577);
        assert.strictEqual(error.limit, 24_576);
        assert.strictEqual(yield* codeCount(), 0);
      }),
    ),
  );

  it.effect("allows oversized code before EIP-170", () => {
    const spec = ReleaseSpecLive(Hardfork.HOMESTEAD);
    const validator = ControlFlowValidatorLive().pipe(
      Layer.provide(InstructionTableLive),
    );
    const dependencies = Layer.mergeAll(
      CodeStoreTest,
      spec,
      validator.pipe(Layer.provide(spec)),
    );
    const layer = Layer.merge(
      dependencies,
      CodeDeployerLive.pipe(Layer.provide(dependencies)),
    );

    return Effect.gen(function* () {
      const address = yield* decodeAddress(ADDRESS);
      const deployed = yield* deployCode(address, new Uint8Array(24_577));
      assert.strictEqual(deployed.size, 24_577);
      assert.strictEqual(yield* codeCount(), 1);
    }).pipe(Effect.provide(layer));
  });

  it.effect("does not redeploy over existing code", () =>
    provideDeployer(
      Effect.gen(function* () {
        const address = yield* decodeAddress(ADDRESS);
        yield* deployCode(address, assembleBytes("STOP"));
        const error = yield* Effect.flip(
          deployCode(address, assembleBytes("PUSH0", "STOP")),
        );
        assert.instanceOf(error, CodeAlreadyDeployedError);
        assert.deepStrictEqual(
          Option.getOrThrow(yield* getCode(address)),
          new Uint8Array([0x00]),
        );
      }),
    ),
  );
});
