import { Either, Schema } from "effect"
import { RESP } from "./RESP.js"

export namespace Commands {
  // String Commands
  export class GET extends Schema.TaggedClass<GET>("GET")("GET", {
    key: Schema.String
  }) {}

  export class SET extends Schema.TaggedClass<SET>("SET")("SET", {
    key: Schema.String,
    value: RESP.ValueFromSelf
  }) {}

  // Hash Commands
  export class HGET extends Schema.TaggedClass<HGET>("HGET")("HGET", {
    key: Schema.String,
    field: Schema.String
  }) {}

  export class HSET extends Schema.TaggedClass<HSET>("HSET")("HSET", {
    key: Schema.String,
    field: Schema.String,
    value: RESP.ValueFromSelf
  }) {}

  export class HGETALL extends Schema.TaggedClass<HGETALL>("HGETALL")("HGETALL", {
    key: Schema.String
  }) {}

  export class HMGET extends Schema.TaggedClass<HMGET>("HMGET")("HMGET", {
    key: Schema.String,
    fields: Schema.Array(Schema.String).pipe(Schema.minItems(1))
  }) {}

  // Set Commands
  export class SADD extends Schema.TaggedClass<SADD>("SADD")("SADD", {
    key: Schema.String,
    member: RESP.ValueFromSelf
  }) {}

  export class SISMEMBER extends Schema.TaggedClass<SISMEMBER>("SISMEMBER")("SISMEMBER", {
    key: Schema.String,
    member: RESP.ValueFromSelf
  }) {}

  // Server Commands
  export class ECHO extends Schema.TaggedClass<ECHO>("ECHO")("ECHO", {
    message: Schema.String
  }) {}

  // anything we do not know the name of; answered with OK
  export class UNRECOGNIZED extends Schema.TaggedClass<UNRECOGNIZED>("UNRECOGNIZED")("UNRECOGNIZED", {}) {}
}

export const Command = Schema.Union(
  Commands.GET,
  Commands.SET,
  Commands.HGET,
  Commands.HSET,
  Commands.HGETALL,
  Commands.HMGET,
  Commands.SADD,
  Commands.SISMEMBER,
  Commands.ECHO,
  Commands.UNRECOGNIZED
)
export type Command = typeof Command.Type

export class InvalidCommand extends Schema.TaggedError<InvalidCommand>("InvalidCommand")("InvalidCommand", {
  message: Schema.String
}) {}

export class InvalidArgument extends Schema.TaggedError<InvalidArgument>("InvalidArgument")("InvalidArgument", {
  message: Schema.String
}) {}

export class InvalidUtf8 extends Schema.TaggedError<InvalidUtf8>("InvalidUtf8")("InvalidUtf8", {
  message: Schema.String
}) {}

export type CommandError = InvalidCommand | InvalidArgument | InvalidUtf8

type Parsed<A> = Either.Either<A, CommandError>

const utf8 = new TextDecoder("utf-8", { fatal: true })

const latin1 = new TextDecoder("latin1")

const asciiLowercase = (bytes: Uint8Array): string =>
  latin1.decode(bytes).replace(/[A-Z]/g, (letter) => letter.toLowerCase())

/**
 * Checks the request has exactly `nArgs` arguments after the name tokens and
 * that every name token matches case-insensitively.
 */
export const validateCommand = (
  request: ReadonlyArray<RESP.Value>,
  names: ReadonlyArray<string>,
  nArgs: number
): Parsed<void> => {
  if (request.length !== names.length + nArgs) {
    return Either.left(
      new InvalidArgument({
        message: `${names.join(" ")} command must have exactly ${nArgs} argument${nArgs === 1 ? "" : "s"}`
      })
    )
  }
  for (const [i, name] of names.entries()) {
    const token = request[i]
    if (token._tag !== "BulkString") {
      return Either.left(
        new InvalidCommand({ message: "Command must have a BulkString as the first argument" })
      )
    }
    if (asciiLowercase(token.value) !== name) {
      return Either.left(
        new InvalidCommand({ message: `Invalid command: expected ${name}, got ${token.text}` })
      )
    }
  }
  return Either.right(undefined)
}

const text = (frame: RESP.Value, what: string): Parsed<string> =>
  frame._tag === "BulkString"
    ? Either.try({
      try: () => utf8.decode(frame.value),
      catch: () => new InvalidUtf8({ message: `Invalid ${what}: not valid UTF-8` })
    })
    : Either.left(new InvalidArgument({ message: `Invalid ${what}: expected a BulkString` }))

interface CommandParser {
  /** Number of arguments expected after the name, given the request length. */
  readonly arity: (requestLength: number) => number
  readonly parse: (args: ReadonlyArray<RESP.Value>) => Parsed<Command>
}

const fixed = (n: number) => () => n

const parsers: ReadonlyMap<string, CommandParser> = new Map<string, CommandParser>([
  ["get", {
    arity: fixed(1),
    parse: ([key]) => Either.map(text(key, "key"), (key) => new Commands.GET({ key }))
  }],
  ["set", {
    arity: fixed(2),
    parse: ([key, value]) => Either.map(text(key, "key"), (key) => new Commands.SET({ key, value }))
  }],
  ["hget", {
    arity: fixed(2),
    parse: ([key, field]) =>
      Either.gen(function*() {
        return new Commands.HGET({ key: yield* text(key, "key"), field: yield* text(field, "field") })
      })
  }],
  ["hset", {
    arity: fixed(3),
    parse: ([key, field, value]) =>
      Either.gen(function*() {
        return new Commands.HSET({ key: yield* text(key, "key"), field: yield* text(field, "field"), value })
      })
  }],
  ["hgetall", {
    arity: fixed(1),
    parse: ([key]) => Either.map(text(key, "key"), (key) => new Commands.HGETALL({ key }))
  }],
  ["hmget", {
    arity: (requestLength) => requestLength - 1,
    parse: ([key, ...fields]) =>
      Either.gen(function*() {
        if (fields.length === 0) {
          return yield* Either.left(new InvalidArgument({ message: "hmget command must have at least 2 arguments" }))
        }
        const parsedKey = yield* text(key, "key")
        const parsedFields: Array<string> = []
        for (const field of fields) {
          parsedFields.push(yield* text(field, "field"))
        }
        return new Commands.HMGET({ key: parsedKey, fields: parsedFields })
      })
  }],
  ["echo", {
    arity: fixed(1),
    parse: ([message]) => Either.map(text(message, "message"), (message) => new Commands.ECHO({ message }))
  }],
  ["sadd", {
    arity: fixed(2),
    parse: ([key, member]) => Either.map(text(key, "key"), (key) => new Commands.SADD({ key, member }))
  }],
  ["sismember", {
    arity: fixed(2),
    parse: ([key, member]) => Either.map(text(key, "key"), (key) => new Commands.SISMEMBER({ key, member }))
  }]
])

/**
 * Turns a request frame into a typed command. Unknown command names are not
 * an error; they become `UNRECOGNIZED`.
 */
export const parseCommand = (frame: RESP.Value): Parsed<Command> => {
  if (frame._tag !== "Array") {
    return Either.left(new InvalidCommand({ message: "Command must be an Array" }))
  }
  const request = frame.value
  const head = request.at(0)
  if (head === undefined || head._tag !== "BulkString") {
    return Either.left(new InvalidCommand({ message: "Command must have a BulkString as the first argument" }))
  }
  const name = asciiLowercase(head.value)
  const parser = parsers.get(name)
  if (parser === undefined) {
    return Either.right(new Commands.UNRECOGNIZED())
  }
  return Either.flatMap(
    validateCommand(request, [name], parser.arity(request.length)),
    () => parser.parse(request.slice(1))
  )
}

/**
 * The request a client sends for a command.
 */
export const commandToRESP = (command: Command): RESP.Array => {
  const request = (...parts: ReadonlyArray<string | RESP.Value>) =>
    new RESP.Array({ value: parts.map((part) => (typeof part === "string" ? RESP.bulk(part) : part)) })

  switch (command._tag) {
    case "GET":
      return request("GET", command.key)
    case "SET":
      return request("SET", command.key, command.value)
    case "HGET":
      return request("HGET", command.key, command.field)
    case "HSET":
      return request("HSET", command.key, command.field, command.value)
    case "HGETALL":
      return request("HGETALL", command.key)
    case "HMGET":
      return request("HMGET", command.key, ...command.fields)
    case "SADD":
      return request("SADD", command.key, command.member)
    case "SISMEMBER":
      return request("SISMEMBER", command.key, command.member)
    case "ECHO":
      return request("ECHO", command.message)
    case "UNRECOGNIZED":
      return request("COMMAND")
  }
}
