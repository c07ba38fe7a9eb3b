import { describe, expect, it } from "@effect/vitest";
import { Effect, Layer, Option } from "effect";
import { RESP } from "../src/RESP.js";
import { Storage } from "../src/Storage.js";
import * as BasicInMemory from "../src/Storage/BasicInMemory.js";
import * as STMBackedInMemory from "../src/Storage/STMBackedInMemory.js";

const backends: ReadonlyArray<readonly [string, Layer.Layer<Storage>]> = [
  ["STMBackedInMemory", STMBackedInMemory.layer],
  ["BasicInMemory", BasicInMemory.layer],
];

for (const [name, layer] of backends) {
  describe(name, () => {
    it.effect("get misses on an unknown key", () =>
      Effect.gen(function* () {
        const storage = yield* Storage;
        expect(Option.isNone(yield* storage.get("missing"))).toBe(true);
      }).pipe(Effect.provide(layer))
    );

    it.effect("set then get, last writer wins", () =>
      Effect.gen(function* () {
        const storage = yield* Storage;
        yield* storage.set("key", RESP.bulk("one"));
        yield* storage.set("key", RESP.bulk("two"));
        const value = yield* storage.get("key");
        expect(Option.getOrThrow(value)).toEqual(RESP.bulk("two"));
      }).pipe(Effect.provide(layer))
    );

    it.effect("hset creates the hash and overwrites fields", () =>
      Effect.gen(function* () {
        const storage = yield* Storage;
        expect(Option.isNone(yield* storage.hget("h", "f"))).toBe(true);
        yield* storage.hset("h", "f", RESP.bulk("v1"));
        yield* storage.hset("h", "f", RESP.bulk("v2"));
        yield* storage.hset("h", "g", RESP.integer(7));
        expect(Option.getOrThrow(yield* storage.hget("h", "f"))).toEqual(RESP.bulk("v2"));
        expect(Option.isNone(yield* storage.hget("h", "missing"))).toBe(true);

        const entries = Option.getOrThrow(yield* storage.hgetall("h"));
        expect(RESP.Map.fromEntries(entries).entries).toEqual([
          ["f", RESP.bulk("v2")],
          ["g", RESP.integer(7)],
        ]);
      }).pipe(Effect.provide(layer))
    );

    it.effect("hgetall and hmget are absent for an unknown key", () =>
      Effect.gen(function* () {
        const storage = yield* Storage;
        expect(Option.isNone(yield* storage.hgetall("nope"))).toBe(true);
        expect(Option.isNone(yield* storage.hmget("nope", ["a"]))).toBe(true);
      }).pipe(Effect.provide(layer))
    );

    it.effect("hmget keeps request order and omits missing fields", () =>
      Effect.gen(function* () {
        const storage = yield* Storage;
        yield* storage.hset("h", "a", RESP.bulk("1"));
        yield* storage.hset("h", "b", RESP.bulk("2"));
        const values = yield* storage.hmget("h", ["b", "zzz", "a"]);
        expect(Option.getOrThrow(values)).toEqual([RESP.bulk("2"), RESP.bulk("1")]);
      }).pipe(Effect.provide(layer))
    );

    it.effect("namespaces are independent", () =>
      Effect.gen(function* () {
        const storage = yield* Storage;
        yield* storage.set("shared", RESP.bulk("string"));
        expect(Option.isNone(yield* storage.hgetall("shared"))).toBe(true);
        expect(yield* storage.sismember("shared", RESP.bulk("string"))).toBe(false);
      }).pipe(Effect.provide(layer))
    );

    it.effect("echo returns the text as a simple string", () =>
      Effect.gen(function* () {
        const storage = yield* Storage;
        expect(Option.getOrThrow(yield* storage.echo("hi"))).toEqual(RESP.simple("hi"));
      }).pipe(Effect.provide(layer))
    );

    it.effect("sadd reports whether the member is new", () =>
      Effect.gen(function* () {
        const storage = yield* Storage;
        expect(yield* storage.sismember("s", RESP.bulk("m"))).toBe(false);
        expect(yield* storage.sadd("s", RESP.bulk("m"))).toBe(true);
        expect(yield* storage.sadd("s", RESP.bulk("m"))).toBe(false);
        expect(yield* storage.sismember("s", RESP.bulk("m"))).toBe(true);
        expect(yield* storage.sismember("s", RESP.bulk("other"))).toBe(false);
      }).pipe(Effect.provide(layer))
    );

    it.effect("set members compare structurally", () =>
      Effect.gen(function* () {
        const storage = yield* Storage;
        yield* storage.sadd("s", new RESP.Double({ value: Number.NaN }));
        yield* storage.sadd(
          "s",
          new RESP.Set({ value: [RESP.integer(1), RESP.integer(2)] })
        );
        expect(
          yield* storage.sismember("s", new RESP.Double({ value: Number.NaN }))
        ).toBe(true);
        expect(
          yield* storage.sismember(
            "s",
            new RESP.Set({ value: [RESP.integer(2), RESP.integer(1)] })
          )
        ).toBe(true);
      }).pipe(Effect.provide(layer))
    );

    it.effect("concurrent sadds of one member report a single insert", () =>
      Effect.gen(function* () {
        const storage = yield* Storage;
        const results = yield* Effect.all(
          Array.from({ length: 50 }, () => storage.sadd("s", RESP.bulk("m"))),
          { concurrency: "unbounded" }
        );
        expect(results.filter((added) => added).length).toBe(1);
      }).pipe(Effect.provide(layer))
    );

    it.effect("concurrent writers to different keys all land", () =>
      Effect.gen(function* () {
        const storage = yield* Storage;
        yield* Effect.all(
          Array.from({ length: 20 }, (_, i) =>
            storage.hset(`h${i % 4}`, `f${i}`, RESP.integer(i))
          ),
          { concurrency: "unbounded" }
        );
        const entries = Option.getOrThrow(yield* storage.hgetall("h1"));
        expect(entries.length).toBe(5);
      }).pipe(Effect.provide(layer))
    );
  });
}
