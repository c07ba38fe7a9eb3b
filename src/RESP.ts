import { Data, Equal, Hash, Order, pipe, Schema, SortedMap } from "effect"

export namespace RESP {
  // simple frames are a single line on the wire
  const withoutTerminators = (value: string): string => value.replace(/[\r\n]/g, " ")

  export class SimpleString extends Data.TaggedClass("SimpleString")<{
    readonly value: string
  }> {
    constructor(args: { readonly value: string }) {
      super({ value: withoutTerminators(args.value) })
    }
  }

  export class SimpleError extends Data.TaggedClass("SimpleError")<{
    readonly value: string
  }> {
    constructor(args: { readonly value: string }) {
      super({ value: withoutTerminators(args.value) })
    }
  }

  export class Integer extends Data.TaggedClass("Integer")<{
    readonly value: bigint
  }> {}

  export class BulkString extends Data.TaggedClass("BulkString")<{
    readonly value: Uint8Array
  }> {
    [Equal.symbol](that: Equal.Equal): boolean {
      return isValue(that) && compare(this, that) === 0
    }

    [Hash.symbol](): number {
      return hash(this)
    }

    get text(): string {
      return textDecoder.decode(this.value)
    }
  }

  export class Array extends Data.TaggedClass("Array")<{
    readonly value: ReadonlyArray<Value>
  }> {
    [Equal.symbol](that: Equal.Equal): boolean {
      return isValue(that) && compare(this, that) === 0
    }

    [Hash.symbol](): number {
      return hash(this)
    }
  }

  export class Null extends Data.TaggedClass("Null")<{}> {}

  export class Boolean extends Data.TaggedClass("Boolean")<{
    readonly value: boolean
  }> {}

  // NaN equals NaN here, unlike IEEE comparison
  export class Double extends Data.TaggedClass("Double")<{
    readonly value: number
  }> {
    [Equal.symbol](that: Equal.Equal): boolean {
      return isValue(that) && compare(this, that) === 0
    }

    [Hash.symbol](): number {
      return hash(this)
    }
  }

  export class Map extends Data.TaggedClass("Map")<{
    readonly value: SortedMap.SortedMap<string, Value>
  }> {
    static fromEntries(entries: Iterable<readonly [string, Value]>): Map {
      let map = SortedMap.empty<string, Value>(Order.string)
      for (const [key, value] of entries) {
        map = SortedMap.set(map, key, value)
      }
      return new Map({ value: map })
    }

    get entries(): ReadonlyArray<readonly [string, Value]> {
      return globalThis.Array.from(this.value)
    }

    [Equal.symbol](that: Equal.Equal): boolean {
      return isValue(that) && compare(this, that) === 0
    }

    [Hash.symbol](): number {
      return hash(this)
    }
  }

  // members keep insertion order, comparisons go through a sorted copy
  export class Set extends Data.TaggedClass("Set")<{
    readonly value: ReadonlyArray<Value>
  }> {
    [Equal.symbol](that: Equal.Equal): boolean {
      return isValue(that) && compare(this, that) === 0
    }

    [Hash.symbol](): number {
      return hash(this)
    }
  }

  export type Value =
    | SimpleString
    | SimpleError
    | Integer
    | BulkString
    | Array
    | Null
    | Boolean
    | Double
    | Map
    | Set

  export const isValue = (u: unknown): u is Value =>
    u instanceof SimpleString ||
    u instanceof SimpleError ||
    u instanceof Integer ||
    u instanceof BulkString ||
    u instanceof Array ||
    u instanceof Null ||
    u instanceof Boolean ||
    u instanceof Double ||
    u instanceof Map ||
    u instanceof Set

  export const ValueFromSelf: Schema.Schema<Value> = Schema.declare(isValue, {
    identifier: "RESP.Value"
  })

  const textEncoder = new TextEncoder()
  const textDecoder = new TextDecoder()

  export const OK = new SimpleString({ value: "OK" })

  export const simple = (value: string): SimpleString => new SimpleString({ value })

  export const error = (value: string): SimpleError => new SimpleError({ value })

  export const integer = (value: number | bigint): Integer => new Integer({ value: BigInt(value) })

  export const bulk = (value: string | Uint8Array): BulkString =>
    new BulkString({ value: typeof value === "string" ? textEncoder.encode(value) : value })

  export const fromBytes = (value: Uint8Array): BulkString => new BulkString({ value })

  const rank: { readonly [Tag in Value["_tag"]]: number } = {
    SimpleString: 0,
    SimpleError: 1,
    Integer: 2,
    BulkString: 3,
    Array: 4,
    Null: 5,
    Boolean: 6,
    Double: 7,
    Map: 8,
    Set: 9
  }

  const compareBytes = (self: Uint8Array, that: Uint8Array): -1 | 0 | 1 => {
    const length = Math.min(self.length, that.length)
    for (let i = 0; i < length; i++) {
      if (self[i] !== that[i]) {
        return self[i] < that[i] ? -1 : 1
      }
    }
    return Order.number(self.length, that.length)
  }

  // NaN sorts after every number
  const compareDoubles = (self: number, that: number): -1 | 0 | 1 => {
    if (Number.isNaN(self)) {
      return Number.isNaN(that) ? 0 : 1
    }
    if (Number.isNaN(that)) {
      return -1
    }
    return self < that ? -1 : self > that ? 1 : 0
  }

  const compareSequences = <A>(
    self: Iterable<A>,
    that: Iterable<A>,
    compareItem: Order.Order<A>
  ): -1 | 0 | 1 => {
    const left = self[Symbol.iterator]()
    const right = that[Symbol.iterator]()
    while (true) {
      const a = left.next()
      const b = right.next()
      if (a.done === true || b.done === true) {
        return a.done === b.done ? 0 : a.done === true ? -1 : 1
      }
      const result = compareItem(a.value, b.value)
      if (result !== 0) {
        return result
      }
    }
  }

  const compareEntries: Order.Order<readonly [string, Value]> = (self, that) => {
    const byKey = Order.string(self[0], that[0])
    return byKey !== 0 ? byKey : compare(self[1], that[1])
  }

  /**
   * Total order over frames: variant rank first, then payload.
   */
  export const compare = (self: Value, that: Value): -1 | 0 | 1 => {
    const byRank = Order.number(rank[self._tag], rank[that._tag])
    if (byRank !== 0) {
      return byRank
    }
    switch (self._tag) {
      case "SimpleString":
        return that._tag === "SimpleString" ? Order.string(self.value, that.value) : 0
      case "SimpleError":
        return that._tag === "SimpleError" ? Order.string(self.value, that.value) : 0
      case "Integer":
        return that._tag === "Integer" ? Order.bigint(self.value, that.value) : 0
      case "BulkString":
        return that._tag === "BulkString" ? compareBytes(self.value, that.value) : 0
      case "Array":
        return that._tag === "Array" ? compareSequences(self.value, that.value, compare) : 0
      case "Null":
        return 0
      case "Boolean":
        return that._tag === "Boolean" ? Order.boolean(self.value, that.value) : 0
      case "Double":
        return that._tag === "Double" ? compareDoubles(self.value, that.value) : 0
      case "Map":
        return that._tag === "Map" ? compareSequences(self.value, that.value, compareEntries) : 0
      case "Set":
        return that._tag === "Set" ? compareSequences(sort(self.value), sort(that.value), compare) : 0
    }
  }

  /**
   * Canonical (sorted) copy of a sequence of frames.
   */
  export const sort = (values: ReadonlyArray<Value>): ReadonlyArray<Value> => [...values].sort(compare)

  const hashValues = (seed: number, values: Iterable<Value>): number => {
    let h = seed
    for (const value of values) {
      h = pipe(h, Hash.combine(hash(value)))
    }
    return h
  }

  const hash = (self: Value): number => {
    const seed = Hash.string(self._tag)
    switch (self._tag) {
      case "SimpleString":
      case "SimpleError":
        return pipe(seed, Hash.combine(Hash.string(self.value)))
      case "Integer":
        return pipe(seed, Hash.combine(Hash.hash(self.value)))
      case "BulkString":
        return self.value.reduce((h, byte) => pipe(h, Hash.combine(byte)), seed)
      case "Array":
        return hashValues(seed, self.value)
      case "Null":
        return seed
      case "Boolean":
        return pipe(seed, Hash.combine(self.value ? 1 : 0))
      case "Double":
        return Number.isNaN(self.value)
          ? pipe(seed, Hash.combine(Hash.string("NaN")))
          : pipe(seed, Hash.combine(Hash.number(self.value === 0 ? 0 : self.value)))
      case "Map": {
        let h = seed
        for (const [key, value] of self.value) {
          h = pipe(h, Hash.combine(Hash.string(key)), Hash.combine(hash(value)))
        }
        return h
      }
      case "Set":
        return hashValues(seed, sort(self.value))
    }
  }
}
