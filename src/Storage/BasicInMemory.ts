import {
  Array,
  Effect,
  Layer,
  MutableHashMap,
  MutableHashSet,
  Option,
} from "effect"
import { RESP } from "../RESP.js"
import { Storage } from "../Storage.js"

// every operation is a single synchronous step
export const layer = Layer.sync(Storage, () => {
  const strings = MutableHashMap.empty<string, RESP.Value>()
  const hashes = MutableHashMap.empty<string, MutableHashMap.MutableHashMap<string, RESP.Value>>()
  const sets = MutableHashMap.empty<string, MutableHashSet.MutableHashSet<RESP.Value>>()

  return Storage.of({
    get: (key) => Effect.sync(() => MutableHashMap.get(strings, key)),
    set: (key, value) =>
      Effect.sync(() => {
        MutableHashMap.set(strings, key, value)
      }),
    hget: (key, field) =>
      Effect.sync(() => Option.flatMap(MutableHashMap.get(hashes, key), (hash) => MutableHashMap.get(hash, field))),
    hset: (key, field, value) =>
      Effect.sync(() => {
        const hash = Option.getOrElse(MutableHashMap.get(hashes, key), () => {
          const created = MutableHashMap.empty<string, RESP.Value>()
          MutableHashMap.set(hashes, key, created)
          return created
        })
        MutableHashMap.set(hash, field, value)
      }),
    hgetall: (key) =>
      Effect.sync(() =>
        Option.map(
          MutableHashMap.get(hashes, key),
          (hash): ReadonlyArray<readonly [string, RESP.Value]> => Array.fromIterable(hash)
        )
      ),
    hmget: (key, fields) =>
      Effect.sync(() =>
        Option.map(
          MutableHashMap.get(hashes, key),
          (hash): ReadonlyArray<RESP.Value> => Array.getSomes(fields.map((field) => MutableHashMap.get(hash, field)))
        )
      ),
    echo: (text) => Effect.succeed(Option.some(RESP.simple(text))),
    sadd: (key, member) =>
      Effect.sync(() => {
        const members = Option.getOrElse(MutableHashMap.get(sets, key), () => {
          const created = MutableHashSet.empty<RESP.Value>()
          MutableHashMap.set(sets, key, created)
          return created
        })
        if (MutableHashSet.has(members, member)) {
          return false
        }
        MutableHashSet.add(members, member)
        return true
      }),
    sismember: (key, member) =>
      Effect.sync(() =>
        Option.match(MutableHashMap.get(sets, key), {
          onNone: () => false,
          onSome: (members) => MutableHashSet.has(members, member)
        })
      )
  })
})
