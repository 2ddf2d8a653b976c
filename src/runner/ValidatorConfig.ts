import * as Context from "effect/Context";
import * as Data from "effect/Data";
import * as Effect from "effect/Effect";
import * as Layer from "effect/Layer";
import * as LogLevel from "effect/LogLevel";
import * as Schema from "effect/Schema";
import { capitalize } from "effect/String";
import { HardforkNameSchema } from "../evm/ReleaseSpec";

const LogLevelNames = [
  "all",
  "trace",
  "debug",
  "info",
  "warning",
  "error",
  "fatal",
  "none",
] as const;

/** Schema for validator configuration resolved from CLI/env/defaults. */
export const ValidatorConfigSchema = Schema.Struct({
  hardfork: HardforkNameSchema,
  logLevel: Schema.Literal(...LogLevelNames),
  format: Schema.Literal("text", "json"),
  strictCodeEnd: Schema.BooleanFromString,
});

/** Raw configuration input shape before schema decoding. */
export type ValidatorConfigInput = Schema.Schema.Encoded<
  typeof ValidatorConfigSchema
>;

/** Decoded configuration used by services. */
export type ValidatorConfigData = Schema.Schema.Type<
  typeof ValidatorConfigSchema
>;

/** Default configuration values used when no overrides are provided. */
export const ValidatorConfigDefaults: ValidatorConfigInput = {
  hardfork: "cancun",
  logLevel: "info",
  format: "text",
  strictCodeEnd: "false",
};

/** Error raised when a recognized CLI option is missing its required value. */
export class ValidatorConfigCliArgumentError extends Data.TaggedError(
  "ValidatorConfigCliArgumentError",
)<{
  readonly option: string;
  readonly reason: "MissingValue";
}> {}

/** Error raised when configuration cannot be decoded. */
export class InvalidValidatorConfigError extends Data.TaggedError(
  "InvalidValidatorConfigError",
)<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

/** Inputs used to resolve the effective configuration. */
export interface ValidatorConfigResolveInput {
  readonly argv?: ReadonlyArray<string>;
  readonly env?: Readonly<Record<string, string | undefined>>;
  readonly configDefaults?: Partial<ValidatorConfigInput>;
}

/** Service contract exposing resolved configuration. */
export interface ValidatorConfigService {
  readonly config: ValidatorConfigData;
}

/** Context tag for validator configuration. */
export class ValidatorConfig extends Context.Tag("ValidatorConfig")<
  ValidatorConfig,
  ValidatorConfigService
>() {}

type ConfigKey = keyof ValidatorConfigInput;

const cliOptionToConfigKey = {
  "--hardfork": "hardfork",
  "--fork": "hardfork",
  "--log-level": "logLevel",
  "--format": "format",
  "-f": "format",
} as const satisfies Record<string, ConfigKey>;

const cliFlagToConfigKey = {
  "--strict-code-end": "strictCodeEnd",
} as const satisfies Record<string, ConfigKey>;

const envVarToConfigKey = {
  hardfork: ["EVM_CODE_VALIDATOR_HARDFORK"],
  logLevel: ["EVM_CODE_VALIDATOR_LOG_LEVEL"],
  format: ["EVM_CODE_VALIDATOR_FORMAT"],
  strictCodeEnd: ["EVM_CODE_VALIDATOR_STRICT_CODE_END"],
} as const satisfies Record<ConfigKey, ReadonlyArray<string>>;

/** CLI options that take a value, for callers separating positionals. */
export const valueOptions: ReadonlySet<string> = new Set(
  Object.keys(cliOptionToConfigKey),
);

const splitInlineCliValue = (
  argument: string,
): readonly [option: string, value: string | undefined] => {
  const separatorIndex = argument.indexOf("=");
  if (separatorIndex < 0) {
    return [argument, undefined];
  }

  return [
    argument.slice(0, separatorIndex),
    argument.slice(separatorIndex + 1),
  ];
};

const failMissingCliValue = (
  option: string,
): Effect.Effect<never, ValidatorConfigCliArgumentError> =>
  Effect.fail(
    new ValidatorConfigCliArgumentError({
      option,
      reason: "MissingValue",
    }),
  );

const parseCliOverrides = (
  argv: ReadonlyArray<string>,
): Effect.Effect<
  Partial<Record<ConfigKey, string>>,
  ValidatorConfigCliArgumentError
> =>
  Effect.gen(function* () {
    const overrides: Partial<Record<ConfigKey, string>> = {};
    const hasCliOption = (
      option: string,
    ): option is keyof typeof cliOptionToConfigKey =>
      option in cliOptionToConfigKey;
    const hasCliFlag = (
      option: string,
    ): option is keyof typeof cliFlagToConfigKey =>
      option in cliFlagToConfigKey;

    for (let index = 0; index < argv.length; index += 1) {
      const argument = argv[index] ?? "";
      if (hasCliFlag(argument)) {
        overrides[cliFlagToConfigKey[argument]] = "true";
        continue;
      }

      const [option, inlineValue] = splitInlineCliValue(argument);
      if (!hasCliOption(option)) {
        continue;
      }

      const configKey = cliOptionToConfigKey[option];

      if (inlineValue !== undefined) {
        if (inlineValue.length === 0) {
          return yield* failMissingCliValue(option);
        }

        overrides[configKey] = inlineValue;
        continue;
      }

      const next = argv[index + 1];
      if (next === undefined || next.startsWith("-")) {
        return yield* failMissingCliValue(option);
      }

      overrides[configKey] = next;
      index += 1;
    }

    return overrides;
  });

const readEnvValue = (
  env: Readonly<Record<string, string | undefined>>,
  names: ReadonlyArray<string>,
): string | undefined => {
  for (const name of names) {
    const value = env[name];
    if (typeof value === "string" && value.trim().length > 0) {
      return value;
    }
  }

  return undefined;
};

const resolveConfigValue = (
  key: ConfigKey,
  cliOverrides: Partial<Record<ConfigKey, string>>,
  env: Readonly<Record<string, string | undefined>>,
  defaults: ValidatorConfigInput,
): string =>
  cliOverrides[key] ??
  readEnvValue(env, envVarToConfigKey[key]) ??
  defaults[key];

const decodeValidatorConfig = (input: Record<ConfigKey, string>) =>
  Schema.decodeUnknown(ValidatorConfigSchema)(input).pipe(
    Effect.mapError(
      (cause) =>
        new InvalidValidatorConfigError({
          message: "Invalid validator config",
          cause,
        }),
    ),
  );

const resolveValidatorConfigInput = ({
  argv = [],
  env = process.env,
  configDefaults = {},
}: ValidatorConfigResolveInput): Effect.Effect<
  Record<ConfigKey, string>,
  ValidatorConfigCliArgumentError
> =>
  Effect.gen(function* () {
    const cliOverrides = yield* parseCliOverrides(argv);
    const defaults = {
      ...ValidatorConfigDefaults,
      ...configDefaults,
    } satisfies ValidatorConfigInput;
    const resolve = (key: ConfigKey) =>
      resolveConfigValue(key, cliOverrides, env, defaults);

    return {
      hardfork: resolve("hardfork"),
      logLevel: resolve("logLevel"),
      format: resolve("format"),
      strictCodeEnd: resolve("strictCodeEnd"),
    };
  });

/** Resolve and decode configuration without building a layer. */
export const resolveValidatorConfig = (
  input: ValidatorConfigResolveInput = {},
): Effect.Effect<
  ValidatorConfigData,
  ValidatorConfigCliArgumentError | InvalidValidatorConfigError
> => Effect.flatMap(resolveValidatorConfigInput(input), decodeValidatorConfig);

/** Live layer for configuration resolution. */
export const ValidatorConfigLive = (
  input: ValidatorConfigResolveInput = {},
): Layer.Layer<
  ValidatorConfig,
  ValidatorConfigCliArgumentError | InvalidValidatorConfigError
> =>
  Layer.effect(
    ValidatorConfig,
    Effect.map(
      resolveValidatorConfig(input),
      (config) => ({ config }) satisfies ValidatorConfigService,
    ),
  );

/** Read the effective configuration. */
export const getValidatorConfig = () =>
  Effect.map(ValidatorConfig, (service) => service.config);

/** Map the configured level name to an effect log level. */
export const toLogLevel = (
  name: ValidatorConfigData["logLevel"],
): LogLevel.LogLevel => LogLevel.fromLiteral(capitalize(name));
