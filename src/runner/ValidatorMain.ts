import { readFile } from "node:fs/promises";
import * as Context from "effect/Context";
import * as Data from "effect/Data";
import * as Effect from "effect/Effect";
import * as Layer from "effect/Layer";
import * as Logger from "effect/Logger";
import packageJson from "../../package.json";
import {
  type Code,
  codeFromHex,
  type InvalidCodeHexError,
} from "../bytecode/Code";
import {
  analyzeCode,
  ControlFlowValidatorLive,
  type ValidationReport,
} from "../bytecode/ControlFlowValidator";
import { InstructionTableLive } from "../bytecode/InstructionTable";
import {
  formatValidationError,
  type ValidationError,
} from "../bytecode/ValidationError";
import { ReleaseSpecLive, toHardfork } from "../evm/ReleaseSpec";
import {
  resolveValidatorConfig,
  toLogLevel,
  type ValidatorConfigData,
  valueOptions,
} from "./ValidatorConfig";

/** Where the code to validate comes from. */
export type CodeSource =
  | Readonly<{ readonly _tag: "Hex"; readonly hex: string }>
  | Readonly<{ readonly _tag: "File"; readonly path: string }>;

/** Top-level actions selected from CLI arguments. */
export type ValidatorMainAction =
  | Readonly<{
      readonly _tag: "Validate";
      readonly source: CodeSource;
    }>
  | Readonly<{
      readonly _tag: "ShowHelp";
    }>
  | Readonly<{
      readonly _tag: "ShowVersion";
    }>;

/** Error raised when mutually-exclusive display flags are requested together. */
export class ValidatorMainCliConflictError extends Data.TaggedError(
  "ValidatorMainCliConflictError",
)<{
  readonly reason: "ConflictingDisplayFlags";
  readonly flags: ReadonlyArray<"--help" | "--version">;
}> {}

/** Error raised when no code, or more than one code source, is given. */
export class ValidatorMainInputError extends Data.TaggedError(
  "ValidatorMainInputError",
)<{
  readonly reason: "MissingCode" | "MultipleSources" | "MissingFilePath";
}> {}

/** Error raised when a code file cannot be read. */
export class CodeFileReadError extends Data.TaggedError("CodeFileReadError")<{
  readonly path: string;
  readonly cause?: unknown;
}> {}

/** Service contract for selecting the top-level action from argv. */
export interface ValidatorMainService {
  readonly selectAction: (
    argv: ReadonlyArray<string>,
  ) => Effect.Effect<
    ValidatorMainAction,
    ValidatorMainCliConflictError | ValidatorMainInputError
  >;
}

/** Context tag for the CLI action selector. */
export class ValidatorMain extends Context.Tag("ValidatorMain")<
  ValidatorMain,
  ValidatorMainService
>() {}

const helpAliases = new Set(["--help", "-h"]);
const versionAliases = new Set(["--version", "-v"]);
const fileOptions = new Set(["--file", "-i"]);

export const HELP_TEXT: ReadonlyArray<string> = [
  "Usage: evm-code-validator [options] (<hex> | --file <path>)",
  "",
  "Statically checks that code cannot reach an invalid instruction,",
  "an invalid jump destination, or a stack underflow/overflow.",
  "",
  "Options:",
  "  --hardfork <name>    instruction set to validate against (default cancun)",
  "  --format text|json   output format (default text)",
  "  --log-level <level>  all|trace|debug|info|warning|error|fatal|none",
  "  --strict-code-end    reject paths that run off the end of code",
  "  -i, --file <path>    read hex-encoded code from a file",
  "  -h, --help           show this help",
  "  -v, --version        show the version",
];

const failConflict = () =>
  Effect.fail(
    new ValidatorMainCliConflictError({
      reason: "ConflictingDisplayFlags",
      flags: ["--help", "--version"],
    }),
  );

const failInput = (reason: ValidatorMainInputError["reason"]) =>
  Effect.fail(new ValidatorMainInputError({ reason }));

const selectSource = (
  argv: ReadonlyArray<string>,
): Effect.Effect<CodeSource, ValidatorMainInputError> =>
  Effect.gen(function* () {
    const sources: Array<CodeSource> = [];
    for (let index = 0; index < argv.length; index += 1) {
      const argument = argv[index] ?? "";
      if (fileOptions.has(argument)) {
        const path = argv[index + 1];
        if (path === undefined || path.startsWith("-")) {
          return yield* failInput("MissingFilePath");
        }
        sources.push({ _tag: "File", path });
        index += 1;
        continue;
      }
      if (valueOptions.has(argument)) {
        index += 1;
        continue;
      }
      if (!argument.startsWith("-")) {
        sources.push({ _tag: "Hex", hex: argument });
      }
    }

    const [source, ...rest] = sources;
    if (source === undefined) {
      return yield* failInput("MissingCode");
    }
    if (rest.length > 0) {
      return yield* failInput("MultipleSources");
    }
    return source;
  });

const makeValidatorMain = Effect.succeed<ValidatorMainService>({
  selectAction: (argv) =>
    Effect.gen(function* () {
      const hasHelp = argv.some((argument) => helpAliases.has(argument));
      const hasVersion = argv.some((argument) => versionAliases.has(argument));

      if (hasHelp && hasVersion) {
        return yield* failConflict();
      }

      if (hasHelp) {
        return {
          _tag: "ShowHelp",
        } satisfies ValidatorMainAction;
      }

      if (hasVersion) {
        return {
          _tag: "ShowVersion",
        } satisfies ValidatorMainAction;
      }

      const source = yield* selectSource(argv);
      return {
        _tag: "Validate",
        source,
      } satisfies ValidatorMainAction;
    }),
} satisfies ValidatorMainService);

/** Live layer for selecting CLI actions. */
export const ValidatorMainLive: Layer.Layer<ValidatorMain> = Layer.effect(
  ValidatorMain,
  makeValidatorMain,
);

/** Select the top-level action from CLI arguments. */
export const selectValidatorMainAction = (argv: ReadonlyArray<string>) =>
  Effect.gen(function* () {
    const service = yield* ValidatorMain;
    return yield* service.selectAction(argv);
  });

const readCodeSource = (
  source: CodeSource,
): Effect.Effect<Code, InvalidCodeHexError | CodeFileReadError> => {
  switch (source._tag) {
    case "Hex":
      return codeFromHex(source.hex);
    case "File":
      return Effect.tryPromise({
        try: () => readFile(source.path, "utf8"),
        catch: (cause) => new CodeFileReadError({ path: source.path, cause }),
      }).pipe(Effect.flatMap(codeFromHex));
  }
};

const validatorLayer = (config: ValidatorConfigData) => {
  const spec = ReleaseSpecLive(toHardfork(config.hardfork));
  return ControlFlowValidatorLive({ strictCodeEnd: config.strictCodeEnd }).pipe(
    Layer.provide(InstructionTableLive),
    Layer.provide(spec),
  );
};

const formatAccepted = (
  config: ValidatorConfigData,
  report: ValidationReport,
): string =>
  config.format === "json"
    ? JSON.stringify({
        accepted: true,
        hardfork: config.hardfork,
        codeLength: report.codeLength,
        instructionsVisited: report.instructionsVisited,
        pathsExplored: report.pathsExplored,
        maxStackHeight: report.maxStackHeight,
        jumpDestinations: report.jumpDestinations,
      })
    : `accepted: ${report.codeLength} bytes, ${report.instructionsVisited} instructions, ` +
      `${report.pathsExplored} paths, max stack ${report.maxStackHeight}`;

const formatRejected = (
  config: ValidatorConfigData,
  error: ValidationError,
): string =>
  config.format === "json"
    ? JSON.stringify({
        accepted: false,
        hardfork: config.hardfork,
        error: error._tag,
        pc: error.pc,
        message: formatValidationError(error),
      })
    : `rejected: ${formatValidationError(error)}`;

/** Outcome of one CLI invocation. */
export interface ValidatorMainResult {
  readonly exitCode: 0 | 1 | 2;
  readonly output: ReadonlyArray<string>;
}

const usageFailure = (message: string): ValidatorMainResult => ({
  exitCode: 2,
  output: [`error: ${message}`],
});

const validateWith = (config: ValidatorConfigData, code: Code) =>
  analyzeCode(code).pipe(
    Effect.match({
      onFailure: (error): ValidatorMainResult => ({
        exitCode: 1,
        output: [formatRejected(config, error)],
      }),
      onSuccess: (report): ValidatorMainResult => ({
        exitCode: 0,
        output: [formatAccepted(config, report)],
      }),
    }),
    Effect.provide(validatorLayer(config)),
  );

/**
 * Run the CLI for `argv` and `env`. Never fails: usage and input errors map
 * to exit code 2, rejected code to 1.
 */
export const runValidatorMain = (
  argv: ReadonlyArray<string>,
  env: Readonly<Record<string, string | undefined>> = process.env,
): Effect.Effect<ValidatorMainResult> =>
  Effect.gen(function* () {
    const action = yield* selectValidatorMainAction(argv);

    switch (action._tag) {
      case "ShowHelp":
        return { exitCode: 0, output: HELP_TEXT } satisfies ValidatorMainResult;
      case "ShowVersion":
        return {
          exitCode: 0,
          output: [packageJson.version],
        } satisfies ValidatorMainResult;
      case "Validate": {
        const config = yield* resolveValidatorConfig({ argv, env });
        const code = yield* readCodeSource(action.source);
        return yield* validateWith(config, code).pipe(
          Logger.withMinimumLogLevel(toLogLevel(config.logLevel)),
        );
      }
    }
  }).pipe(
    Effect.provide(ValidatorMainLive),
    Effect.catchTags({
      ValidatorConfigCliArgumentError: (error) =>
        Effect.succeed(usageFailure(`${error.option} requires a value`)),
      InvalidValidatorConfigError: (error) =>
        Effect.succeed(usageFailure(error.message)),
      ValidatorMainCliConflictError: (error) =>
        Effect.succeed(
          usageFailure(`${error.flags.join(" and ")} cannot be combined`),
        ),
      ValidatorMainInputError: (error) =>
        Effect.succeed(
          usageFailure(
            error.reason === "MissingCode"
              ? "no code given"
              : error.reason === "MultipleSources"
                ? "give exactly one code source"
                : "--file requires a path",
          ),
        ),
      InvalidCodeHexError: (error) => Effect.succeed(usageFailure(error.message)),
      CodeFileReadError: (error) =>
        Effect.succeed(usageFailure(`cannot read ${error.path}`)),
    }),
  );
