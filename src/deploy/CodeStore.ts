import * as Context from "effect/Context";
import * as Data from "effect/Data";
import * as Effect from "effect/Effect";
import * as Layer from "effect/Layer";
import * as Option from "effect/Option";
import * as Schema from "effect/Schema";
import { Address } from "voltaire-effect/primitives";

/** `0x` followed by 40 hex digits, in any case. */
export const AddressHexSchema = Schema.String.pipe(
  Schema.pattern(/^0x[0-9a-fA-F]{40}$/),
);

/** Error raised when an address string is malformed. */
export class InvalidAddressError extends Data.TaggedError(
  "InvalidAddressError",
)<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

/** Error raised when code is written to an address that already has code. */
export class CodeAlreadyDeployedError extends Data.TaggedError(
  "CodeAlreadyDeployedError",
)<{
  readonly address: Address.AddressType;
}> {}

/** Decode a hex address string. */
export const decodeAddress = (
  address: string,
): Effect.Effect<Address.AddressType, InvalidAddressError> => {
  const invalidAddress = (cause: unknown) =>
    new InvalidAddressError({
      message: `Invalid address ${address}`,
      cause,
    });
  return Schema.decode(AddressHexSchema)(address).pipe(
    Effect.mapError(invalidAddress),
    Effect.flatMap((validated) =>
      Address.fromHex(validated).pipe(Effect.mapError(invalidAddress)),
    ),
  );
};

/** Persistent code storage keyed by account address. */
export interface CodeStoreService {
  readonly getCode: (
    address: Address.AddressType,
  ) => Effect.Effect<Option.Option<Uint8Array>>;
  readonly hasCode: (address: Address.AddressType) => Effect.Effect<boolean>;
  readonly putCode: (
    address: Address.AddressType,
    code: Uint8Array,
  ) => Effect.Effect<void, CodeAlreadyDeployedError>;
  readonly codeCount: () => Effect.Effect<number>;
}

/** Context tag for the code store. */
export class CodeStore extends Context.Tag("CodeStore")<
  CodeStore,
  CodeStoreService
>() {}

const withCodeStore = <A, E, R>(
  f: (service: CodeStoreService) => Effect.Effect<A, E, R>,
) => Effect.flatMap(CodeStore, f);

const makeMemoryCodeStore = Effect.sync(() => {
  const codes = new Map<string, Uint8Array>();

  return {
    getCode: (address) =>
      Effect.sync(() =>
        Option.map(
          Option.fromNullable(codes.get(Address.toHex(address))),
          (code) => code.slice(),
        ),
      ),
    hasCode: (address) => Effect.sync(() => codes.has(Address.toHex(address))),
    putCode: (address, code) =>
      Effect.suspend(() => {
        const key = Address.toHex(address);
        if (codes.has(key)) {
          return Effect.fail(new CodeAlreadyDeployedError({ address }));
        }
        codes.set(key, code.slice());
        return Effect.void;
      }),
    codeCount: () => Effect.sync(() => codes.size),
  } satisfies CodeStoreService;
});

/** In-memory code store. */
export const CodeStoreMemory: Layer.Layer<CodeStore> = Layer.effect(
  CodeStore,
  makeMemoryCodeStore,
);

/** Deterministic code store layer for tests. */
export const CodeStoreTest: Layer.Layer<CodeStore> = CodeStoreMemory;

/** Read the code stored at an address. */
export const getCode = (address: Address.AddressType) =>
  withCodeStore((service) => service.getCode(address));

/** Whether an address has code. */
export const hasCode = (address: Address.AddressType) =>
  withCodeStore((service) => service.hasCode(address));

/** Store code at an address that has none. */
export const putCode = (address: Address.AddressType, code: Uint8Array) =>
  withCodeStore((service) => service.putCode(address, code));

/** Number of addresses with code. */
export const codeCount = () => withCodeStore((service) => service.codeCount());
