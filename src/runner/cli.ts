import * as Console from "effect/Console";
import * as Effect from "effect/Effect";
import { runValidatorMain } from "./ValidatorMain";

const program = Effect.gen(function* () {
  const result = yield* runValidatorMain(process.argv.slice(2));
  const print = result.exitCode === 2 ? Console.error : Console.log;
  for (const line of result.output) {
    yield* print(line);
  }
  return result.exitCode;
});

Effect.runPromise(program).then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (cause: unknown) => {
    console.error(cause);
    process.exitCode = 2;
  },
);
