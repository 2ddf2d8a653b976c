import { assert, describe, it } from "@effect/vitest";
import * as Effect from "effect/Effect";
import * as Option from "effect/Option";
import { Address } from "voltaire-effect/primitives";
import {
  CodeAlreadyDeployedError,
  codeCount,
  CodeStoreTest,
  decodeAddress,
  getCode,
  hasCode,
  InvalidAddressError,
  putCode,
} from "./CodeStore";

const ADDRESS = "0x00000000000000000000000000000000000000aa";

describe("CodeStore", () => {
  it.effect("stores and returns code by address", () =>
    Effect.gen(function* () {
      const address = yield* decodeAddress(ADDRESS);
      assert.isFalse(yield* hasCode(address));

      yield* putCode(address, new Uint8Array([0x00]));

      assert.isTrue(yield* hasCode(address));
      assert.strictEqual(yield* codeCount(), 1);
      const stored = yield* getCode(address);
      assert.deepStrictEqual(Option.getOrThrow(stored), new Uint8Array([0x00]));
    }).pipe(Effect.provide(CodeStoreTest)),
  );

  it.effect("refuses to overwrite existing code", () =>
    Effect.gen(function* () {
      const address = yield* decodeAddress(ADDRESS);
      yield* putCode(address, new Uint8Array([0x00]));
      const error = yield* Effect.flip(putCode(address, new Uint8Array([0x5b])));
      assert.instanceOf(error, CodeAlreadyDeployedError);
      assert.strictEqual(Address.toHex(error.address), ADDRESS);
      const stored = yield* getCode(address);
      assert.deepStrictEqual(Option.getOrThrow(stored), new Uint8Array([0x00]));
    }).pipe(Effect.provide(CodeStoreTest)),
  );

  it.effect("treats mixed-case hex as the same address", () =>
    Effect.gen(function* () {
      const address = yield* decodeAddress(
        "0x00000000000000000000000000000000000000AA",
      );
      assert.strictEqual(Address.toHex(address), ADDRESS);
    }),
  );

  it.effect("keys stored code by address value", () =>
    Effect.gen(function* () {
      const lower = yield* decodeAddress(ADDRESS);
      const upper = yield* decodeAddress(
        "0x00000000000000000000000000000000000000AA",
      );
      yield* putCode(lower, new Uint8Array([0x00]));
      assert.isTrue(yield* hasCode(upper));
    }).pipe(Effect.provide(CodeStoreTest)),
  );

  it.effect("rejects malformed addresses", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(decodeAddress("0x1234"));
      assert.instanceOf(error, InvalidAddressError);
      assert.strictEqual(error.message, "Invalid address 0x1234");
    }),
  );
});
