import * as Context from "effect/Context";
import * as Data from "effect/Data";
import * as Effect from "effect/Effect";
import * as Layer from "effect/Layer";
import { Address } from "voltaire-effect/primitives";
import { Code } from "../bytecode/Code";
import {
  ControlFlowValidator,
  ControlFlowValidatorLive,
  type ControlFlowValidatorOptions,
} from "../bytecode/ControlFlowValidator";
import { InstructionTableLive } from "../bytecode/InstructionTable";
import {
  formatValidationError,
  type ValidationError,
} from "../bytecode/ValidationError";
import { ReleaseSpec, ReleaseSpecCancun } from "../evm/ReleaseSpec";
import {
  type CodeAlreadyDeployedError,
  CodeStore,
  CodeStoreTest,
} from "./CodeStore";

/** Error raised when code fails static control-flow validation. */
export class CodeRejectedError extends Data.TaggedError("CodeRejectedError")<{
  readonly address: Address.AddressType;
  readonly reason: ValidationError;
}> {}

/** Error raised when code exceeds the EIP-170 size limit. */
export class CodeSizeLimitExceededError extends Data.TaggedError(
  "CodeSizeLimitExceededError",
)<{
  readonly address: Address.AddressType;
  readonly size: number;
  readonly limit: number;
}> {}

/** Union of deployment errors. */
export type CodeDeploymentError =
  | CodeRejectedError
  | CodeSizeLimitExceededError
  | CodeAlreadyDeployedError;

/** Result of a successful deployment. */
export interface DeployedCode {
  readonly address: Address.AddressType;
  readonly size: number;
}

/** Validates code and commits it to the code store. */
export interface CodeDeployerService {
  readonly deploy: (
    address: Address.AddressType,
    bytes: Uint8Array,
  ) => Effect.Effect<DeployedCode, CodeDeploymentError>;
}

/** Context tag for the code deployer. */
export class CodeDeployer extends Context.Tag("CodeDeployer")<
  CodeDeployer,
  CodeDeployerService
>() {}

const makeCodeDeployer = Effect.gen(function* () {
  const spec = yield* ReleaseSpec;
  const validator = yield* ControlFlowValidator;
  const store = yield* CodeStore;

  const ensureSize = (
    address: Address.AddressType,
    size: number,
  ): Effect.Effect<void, CodeSizeLimitExceededError> =>
    spec.isEip170Enabled && size > spec.maxCodeSize
      ? Effect.fail(
          new CodeSizeLimitExceededError({
            address,
            size,
            limit: spec.maxCodeSize,
          }),
        )
      : Effect.void;

  return {
    deploy: (address, bytes) =>
      Effect.gen(function* () {
        yield* ensureSize(address, bytes.length);
        const code = new Code(bytes);
        yield* validator.validate(code).pipe(
          Effect.mapError(
            (reason) => new CodeRejectedError({ address, reason }),
          ),
          Effect.tapError((error) =>
            Effect.logWarning(
              "code creation aborted",
              formatValidationError(error.reason),
            ),
          ),
        );
        // Nothing is written until validation has passed.
        yield* store.putCode(address, code.toBytes());
        yield* Effect.logInfo("code deployed");
        return { address, size: code.length } satisfies DeployedCode;
      }).pipe(Effect.annotateLogs({ address: Address.toHex(address) })),
  } satisfies CodeDeployerService;
});

/** Production deployer layer. */
export const CodeDeployerLive: Layer.Layer<
  CodeDeployer,
  never,
  ReleaseSpec | ControlFlowValidator | CodeStore
> = Layer.effect(CodeDeployer, makeCodeDeployer);

/** Deployer over Cancun rules and an in-memory store, for tests. */
export const CodeDeployerTest = (
  options: ControlFlowValidatorOptions = {},
): Layer.Layer<CodeDeployer | CodeStore | ReleaseSpec> => {
  const validator = ControlFlowValidatorLive(options).pipe(
    Layer.provide(InstructionTableLive),
  );
  const dependencies = Layer.mergeAll(
    CodeStoreTest,
    ReleaseSpecCancun,
    validator.pipe(Layer.provide(ReleaseSpecCancun)),
  );
  return Layer.merge(
    dependencies,
    CodeDeployerLive.pipe(Layer.provide(dependencies)),
  );
};

/** Validate code and store it at `address`. */
export const deployCode = (address: Address.AddressType, bytes: Uint8Array) =>
  Effect.flatMap(CodeDeployer, (service) => service.deploy(address, bytes));
