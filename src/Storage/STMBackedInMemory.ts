import {
  Array,
  Effect,
  Layer,
  Option,
  pipe,
  STM,
  TMap,
  TSet,
} from "effect";
import { RESP } from "../RESP.js";
import type { StorageImpl } from "../Storage.js";
import { Storage } from "../Storage.js";

// every call commits one transaction; conflicts are tracked per TMap bucket

type Hash = TMap.TMap<string, RESP.Value>;
type Members = TSet.TSet<RESP.Value>;

const getOrCreate = <V>(
  map: TMap.TMap<string, V>,
  key: string,
  make: STM.STM<V>
): STM.STM<V> =>
  STM.gen(function* () {
    const existing = yield* TMap.get(map, key);
    if (Option.isSome(existing)) {
      return existing.value;
    }
    const created = yield* make;
    yield* TMap.set(map, key, created);
    return created;
  });

class STMBackedInMemoryStore implements StorageImpl {
  readonly strings: TMap.TMap<string, RESP.Value>;
  readonly hashes: TMap.TMap<string, Hash>;
  readonly sets: TMap.TMap<string, Members>;

  constructor(
    strings: TMap.TMap<string, RESP.Value>,
    hashes: TMap.TMap<string, Hash>,
    sets: TMap.TMap<string, Members>
  ) {
    this.strings = strings;
    this.hashes = hashes;
    this.sets = sets;
  }

  static make = Effect.gen(function* () {
    const strings = yield* TMap.empty<string, RESP.Value>();
    const hashes = yield* TMap.empty<string, Hash>();
    const sets = yield* TMap.empty<string, Members>();
    return new STMBackedInMemoryStore(strings, hashes, sets);
  });

  get(key: string) {
    return STM.commit(TMap.get(this.strings, key));
  }

  set(key: string, value: RESP.Value) {
    return STM.commit(TMap.set(this.strings, key, value));
  }

  hget(key: string, field: string) {
    return STM.gen(this, function* () {
      const hash = yield* TMap.get(this.hashes, key);
      if (Option.isNone(hash)) {
        return Option.none();
      }
      return yield* TMap.get(hash.value, field);
    }).pipe(STM.commit);
  }

  hset(key: string, field: string, value: RESP.Value) {
    return STM.gen(this, function* () {
      const hash = yield* getOrCreate(
        this.hashes,
        key,
        TMap.empty<string, RESP.Value>()
      );
      yield* TMap.set(hash, field, value);
    }).pipe(STM.commit);
  }

  hgetall(key: string) {
    return STM.gen(this, function* () {
      const hash = yield* TMap.get(this.hashes, key);
      if (Option.isNone(hash)) {
        return Option.none();
      }
      const entries: ReadonlyArray<readonly [string, RESP.Value]> =
        yield* TMap.toArray(hash.value);
      return Option.some(entries);
    }).pipe(STM.commit);
  }

  hmget(key: string, fields: ReadonlyArray<string>) {
    return STM.gen(this, function* () {
      const hash = yield* TMap.get(this.hashes, key);
      if (Option.isNone(hash)) {
        return Option.none();
      }
      const found = yield* STM.forEach(fields, (field) =>
        TMap.get(hash.value, field)
      );
      const values: ReadonlyArray<RESP.Value> = Array.getSomes(found);
      return Option.some(values);
    }).pipe(STM.commit);
  }

  echo(text: string) {
    return Effect.succeed(Option.some<RESP.Value>(RESP.simple(text)));
  }

  sadd(key: string, member: RESP.Value) {
    return STM.gen(this, function* () {
      const members = yield* getOrCreate(
        this.sets,
        key,
        TSet.empty<RESP.Value>()
      );
      if (yield* TSet.has(members, member)) {
        return false;
      }
      yield* TSet.add(members, member);
      return true;
    }).pipe(STM.commit);
  }

  sismember(key: string, member: RESP.Value) {
    return pipe(
      TMap.get(this.sets, key),
      STM.flatMap(
        Option.match({
          onNone: () => STM.succeed(false),
          onSome: (members) => TSet.has(members, member),
        })
      ),
      STM.commit
    );
  }
}

export const layer = Layer.effect(Storage, STMBackedInMemoryStore.make);
