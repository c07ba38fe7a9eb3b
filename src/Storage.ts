import { Context, type Effect, type Option } from "effect";
import type { RESP } from "./RESP.js";

export interface StorageImpl {
  get(key: string): Effect.Effect<Option.Option<RESP.Value>>;
  set(key: string, value: RESP.Value): Effect.Effect<void>;

  hget(key: string, field: string): Effect.Effect<Option.Option<RESP.Value>>;
  hset(key: string, field: string, value: RESP.Value): Effect.Effect<void>;
  /** Snapshot of every field of the hash, absent when the key was never written. */
  hgetall(
    key: string
  ): Effect.Effect<Option.Option<ReadonlyArray<readonly [string, RESP.Value]>>>;
  /** Values of the fields that exist, in request order. */
  hmget(
    key: string,
    fields: ReadonlyArray<string>
  ): Effect.Effect<Option.Option<ReadonlyArray<RESP.Value>>>;

  echo(text: string): Effect.Effect<Option.Option<RESP.Value>>;

  /** `true` when the member was not in the set before. */
  sadd(key: string, member: RESP.Value): Effect.Effect<boolean>;
  sismember(key: string, member: RESP.Value): Effect.Effect<boolean>;
}

export class Storage extends Context.Tag("Storage")<Storage, StorageImpl>() {}
