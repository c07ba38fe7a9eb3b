import { describe, expect, it } from "@effect/vitest"
import { Either } from "effect"
import { type Command, Commands, commandToRESP, parseCommand, validateCommand } from "../src/Command.js"
import { RESP } from "../src/RESP.js"

const request = (...parts: ReadonlyArray<string | RESP.Value>) =>
  new RESP.Array({ value: parts.map((part) => (typeof part === "string" ? RESP.bulk(part) : part)) })

const failure = (frame: RESP.Value) =>
  Either.match(parseCommand(frame), {
    onLeft: (error) => ({ tag: error._tag, message: error.message }),
    onRight: (command) => ({ tag: command._tag, message: "" })
  })

describe("parseCommand", () => {
  it("parses GET regardless of name case", () => {
    expect(Either.getOrThrow(parseCommand(request("get", "hello")))).toEqual(new Commands.GET({ key: "hello" }))
    expect(Either.getOrThrow(parseCommand(request("GeT", "hello")))).toEqual(new Commands.GET({ key: "hello" }))
  })

  it("keeps value arguments as frames", () => {
    const value = new RESP.Array({ value: [RESP.integer(1)] })
    expect(Either.getOrThrow(parseCommand(request("SET", "k", value)))).toEqual(new Commands.SET({ key: "k", value }))
    expect(Either.getOrThrow(parseCommand(request("sadd", "s", RESP.integer(3))))).toEqual(new Commands.SADD({ key: "s", member: RESP.integer(3) }))
  })

  it("parses the hash commands", () => {
    expect(Either.getOrThrow(parseCommand(request("hset", "h", "f", "v")))).toEqual(new Commands.HSET({ key: "h", field: "f", value: RESP.bulk("v") }))
    expect(Either.getOrThrow(parseCommand(request("hget", "h", "f")))).toEqual(new Commands.HGET({ key: "h", field: "f" }))
    expect(Either.getOrThrow(parseCommand(request("HGETALL", "h")))).toEqual(new Commands.HGETALL({ key: "h" }))
    expect(Either.getOrThrow(parseCommand(request("hmget", "h", "a", "b")))).toEqual(new Commands.HMGET({ key: "h", fields: ["a", "b"] }))
  })

  it("parses ECHO and SISMEMBER", () => {
    expect(Either.getOrThrow(parseCommand(request("echo", "hi")))).toEqual(new Commands.ECHO({ message: "hi" }))
    expect(Either.getOrThrow(parseCommand(request("sismember", "s", "m")))).toEqual(new Commands.SISMEMBER({ key: "s", member: RESP.bulk("m") }))
  })

  it("rejects the wrong number of arguments", () => {
    expect(failure(request("get", "hello", "extra"))).toEqual({
      tag: "InvalidArgument",
      message: "get command must have exactly 1 argument"
    })
    expect(failure(request("hset", "h", "f"))).toEqual({
      tag: "InvalidArgument",
      message: "hset command must have exactly 3 arguments"
    })
  })

  it("requires HMGET to name at least one field", () => {
    expect(failure(request("hmget", "h"))).toEqual({
      tag: "InvalidArgument",
      message: "hmget command must have at least 2 arguments"
    })
  })

  it("answers unknown names with UNRECOGNIZED", () => {
    expect(Either.getOrThrow(parseCommand(request("noop")))).toEqual(new Commands.UNRECOGNIZED())
    expect(Either.getOrThrow(parseCommand(request("COMMAND", "DOCS")))).toEqual(new Commands.UNRECOGNIZED())
  })

  it("matches the whole name, however long", () => {
    expect(Either.getOrThrow(parseCommand(request("get" + "x".repeat(97), "k")))).toEqual(new Commands.UNRECOGNIZED())
    expect(Either.getOrThrow(parseCommand(request("HGETALL", "h")))).toEqual(new Commands.HGETALL({ key: "h" }))
  })

  it("rejects frames that are not commands", () => {
    expect(failure(RESP.simple("get"))).toEqual({ tag: "InvalidCommand", message: "Command must be an Array" })
    expect(failure(new RESP.Array({ value: [] }))).toEqual({
      tag: "InvalidCommand",
      message: "Command must have a BulkString as the first argument"
    })
    expect(failure(new RESP.Array({ value: [RESP.simple("get"), RESP.bulk("k")] }))).toEqual({
      tag: "InvalidCommand",
      message: "Command must have a BulkString as the first argument"
    })
  })

  it("requires text arguments to be UTF-8 bulk strings", () => {
    expect(failure(request("get", RESP.integer(1)))).toEqual({
      tag: "InvalidArgument",
      message: "Invalid key: expected a BulkString"
    })
    expect(failure(request("echo", RESP.bulk(new Uint8Array([0xc3, 0x28]))))).toEqual({
      tag: "InvalidUtf8",
      message: "Invalid message: not valid UTF-8"
    })
  })
})

describe("validateCommand", () => {
  const message = (result: Either.Either<void, { readonly message: string }>) =>
    Either.match(result, { onLeft: (error) => error.message, onRight: () => "" })

  it("checks the length and every name token", () => {
    const frames = request("CONFIG", "GET", "x").value
    expect(Either.isRight(validateCommand(frames, ["config", "get"], 1))).toBe(true)
    expect(message(validateCommand(frames, ["config", "set"], 1))).toBe("Invalid command: expected set, got GET")
    expect(message(validateCommand(frames, ["config", "get"], 2))).toBe(
      "config get command must have exactly 2 arguments"
    )
  })

  it("compares name tokens past 64 bytes", () => {
    const long = "a".repeat(64)
    expect(Either.isRight(validateCommand(request("A".repeat(64)).value, [long], 0))).toBe(true)
    expect(message(validateCommand(request("A".repeat(64) + "b").value, [long], 0))).toBe(
      `Invalid command: expected ${long}, got ${"A".repeat(64)}b`
    )
  })
})

describe("commandToRESP", () => {
  it("produces requests that parse back to the same command", () => {
    const commands: ReadonlyArray<Command> = [
      new Commands.GET({ key: "k" }),
      new Commands.SET({ key: "k", value: RESP.integer(9) }),
      new Commands.HGET({ key: "h", field: "f" }),
      new Commands.HSET({ key: "h", field: "f", value: RESP.bulk("v") }),
      new Commands.HGETALL({ key: "h" }),
      new Commands.HMGET({ key: "h", fields: ["a", "b"] }),
      new Commands.SADD({ key: "s", member: RESP.bulk("m") }),
      new Commands.SISMEMBER({ key: "s", member: RESP.bulk("m") }),
      new Commands.ECHO({ message: "hello" })
    ]
    for (const command of commands) {
      expect(Either.getOrThrow(parseCommand(commandToRESP(command)))).toEqual(command)
    }
  })

  it("writes upper-case names", () => {
    expect(commandToRESP(new Commands.GET({ key: "k" }))).toEqual(request("GET", "k"))
  })
})
