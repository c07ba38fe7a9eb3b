import { Effect, Option } from "effect";
import type { Command } from "./Command.js";
import { RESP } from "./RESP.js";
import { Storage } from "./Storage.js";

const emptyArray = new RESP.Array({ value: [] });

const valueOrNull = Option.getOrElse<RESP.Value>(() => new RESP.Null());

/**
 * Runs one command against the store. Never fails: a miss is answered with
 * `Null` or an empty array.
 */
export const execute = (
  command: Command
): Effect.Effect<RESP.Value, never, Storage> =>
  Effect.gen(function* () {
    const storage = yield* Storage;
    switch (command._tag) {
      case "GET":
        return valueOrNull(yield* storage.get(command.key));
      case "SET":
        yield* storage.set(command.key, command.value);
        return RESP.OK;
      case "HGET":
        return valueOrNull(yield* storage.hget(command.key, command.field));
      case "HSET":
        yield* storage.hset(command.key, command.field, command.value);
        return RESP.OK;
      case "HGETALL":
        return Option.match(yield* storage.hgetall(command.key), {
          onNone: (): RESP.Value => emptyArray,
          onSome: (entries) => RESP.Map.fromEntries(entries),
        });
      case "HMGET":
        return Option.match(yield* storage.hmget(command.key, command.fields), {
          onNone: (): RESP.Value => emptyArray,
          onSome: (value) => new RESP.Array({ value }),
        });
      case "ECHO":
        return valueOrNull(yield* storage.echo(command.message));
      case "SADD":
        return RESP.integer(
          (yield* storage.sadd(command.key, command.member)) ? 1 : 0
        );
      case "SISMEMBER":
        return RESP.integer(
          (yield* storage.sismember(command.key, command.member)) ? 1 : 0
        );
      case "UNRECOGNIZED":
        return RESP.OK;
    }
  });
