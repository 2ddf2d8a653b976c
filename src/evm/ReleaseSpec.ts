import * as Context from "effect/Context";
import * as Layer from "effect/Layer";
import * as Schema from "effect/Schema";
import { Hardfork } from "voltaire-effect/primitives";

/** Hardfork names accepted in configuration and `opcodes.json`. */
export const HardforkNames = [
  "frontier",
  "homestead",
  "tangerineWhistle",
  "spuriousDragon",
  "byzantium",
  "constantinople",
  "petersburg",
  "istanbul",
  "berlin",
  "london",
  "paris",
  "shanghai",
  "cancun",
  "prague",
] as const;

export type HardforkName = (typeof HardforkNames)[number];

export const HardforkNameSchema = Schema.Literal(...HardforkNames);

const hardforksByName = {
  frontier: Hardfork.FRONTIER,
  homestead: Hardfork.HOMESTEAD,
  tangerineWhistle: Hardfork.TANGERINE_WHISTLE,
  spuriousDragon: Hardfork.SPURIOUS_DRAGON,
  byzantium: Hardfork.BYZANTIUM,
  constantinople: Hardfork.CONSTANTINOPLE,
  petersburg: Hardfork.PETERSBURG,
  istanbul: Hardfork.ISTANBUL,
  berlin: Hardfork.BERLIN,
  london: Hardfork.LONDON,
  paris: Hardfork.MERGE,
  shanghai: Hardfork.SHANGHAI,
  cancun: Hardfork.CANCUN,
  prague: Hardfork.PRAGUE,
} as const satisfies Record<HardforkName, Hardfork.HardforkType>;

export const toHardfork = (name: HardforkName): Hardfork.HardforkType =>
  hardforksByName[name];

/** Hardfork-driven limits and feature flags for code validation. */
export interface ReleaseSpecService {
  readonly hardfork: Hardfork.HardforkType;
  /** EIP-170 contract code size limit. */
  readonly isEip170Enabled: boolean;
  /** EIP-3855 PUSH0. */
  readonly isEip3855Enabled: boolean;
  readonly maxCodeSize: number;
  readonly stackLimit: number;
}

/** Context tag for the release specification service. */
export class ReleaseSpec extends Context.Tag("ReleaseSpec")<
  ReleaseSpec,
  ReleaseSpecService
>() {}

export const MAX_CODE_SIZE = 24_576;
export const STACK_LIMIT = 1024;

export type ReleaseSpecOverrides = Partial<Omit<ReleaseSpecService, "hardfork">>;

export const makeReleaseSpec = (
  hardfork: Hardfork.HardforkType,
  overrides: ReleaseSpecOverrides = {},
): ReleaseSpecService => {
  const base = {
    hardfork,
    isEip170Enabled: Hardfork.isAtLeast(hardfork, Hardfork.SPURIOUS_DRAGON),
    isEip3855Enabled: Hardfork.isAtLeast(hardfork, Hardfork.SHANGHAI),
    maxCodeSize: MAX_CODE_SIZE,
    stackLimit: STACK_LIMIT,
  } satisfies ReleaseSpecService;

  return {
    ...base,
    ...overrides,
  } satisfies ReleaseSpecService;
};

/** Build a release spec layer for a specific hardfork. */
export const ReleaseSpecLive = (
  hardfork: Hardfork.HardforkType,
  overrides?: ReleaseSpecOverrides,
) => Layer.succeed(ReleaseSpec, makeReleaseSpec(hardfork, overrides));

/** Cancun hardfork release spec layer. */
export const ReleaseSpecCancun: Layer.Layer<ReleaseSpec> = ReleaseSpecLive(
  Hardfork.CANCUN,
);
