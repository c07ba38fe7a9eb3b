import { Data, Either } from "effect";
import { RESP } from "../RESP.js";
import type { RespBuffer } from "./Buffer.js";

export class NotComplete extends Data.TaggedError("NotComplete")<{}> {}

export class InvalidFrameType extends Data.TaggedError("InvalidFrameType")<{
  readonly message: string;
}> {}

export class InvalidFrame extends Data.TaggedError("InvalidFrame")<{
  readonly message: string;
}> {}

export class InvalidFrameLength extends Data.TaggedError("InvalidFrameLength")<{
  readonly message: string;
  readonly length: number;
}> {}

export class ParseIntError extends Data.TaggedError("ParseIntError")<{
  readonly message: string;
}> {}

export class ParseFloatError extends Data.TaggedError("ParseFloatError")<{
  readonly message: string;
}> {}

export class Utf8Error extends Data.TaggedError("Utf8Error")<{
  readonly message: string;
  readonly cause: unknown;
}> {}

export type DecodeError =
  | NotComplete
  | InvalidFrameType
  | InvalidFrame
  | InvalidFrameLength
  | ParseIntError
  | ParseFloatError
  | Utf8Error;

type Decoded<A> = Either.Either<A, DecodeError>;

const CR = 13;
const LF = 10;

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;
const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

const utf8 = new TextDecoder("utf-8", { fatal: true });
const latin1 = new TextDecoder("latin1");

const ascii = (bytes: Uint8Array): string => latin1.decode(bytes);

const decodeText = (bytes: Uint8Array): Decoded<string> =>
  Either.try({
    try: () => utf8.decode(bytes),
    catch: (cause) => new Utf8Error({ message: "Invalid UTF-8 sequence", cause }),
  });

const findCrlf = (bytes: Uint8Array, from: number): number => {
  for (let i = from; i < bytes.length - 1; i++) {
    if (bytes[i] === CR && bytes[i + 1] === LF) {
      return i;
    }
  }
  return -1;
};

/** Length of the CRLF-terminated line starting at `offset`, marker included. */
const lineLength = (bytes: Uint8Array, offset: number): Decoded<number> => {
  const end = findCrlf(bytes, offset + 1);
  return end === -1 ? Either.left(new NotComplete()) : Either.right(end + 2 - offset);
};

const parseCount = (text: string): Decoded<number> =>
  INTEGER_PATTERN.test(text)
    ? Either.right(Number(text))
    : Either.left(new ParseIntError({ message: `Invalid length: '${text}'` }));

/** Reads the `<marker><count>\r\n` header of a length-prefixed frame. */
const readHeader = (bytes: Uint8Array, offset: number) =>
  Either.gen(function* () {
    const headerLength = yield* lineLength(bytes, offset);
    const count = yield* parseCount(ascii(bytes.subarray(offset + 1, offset + headerLength - 2)));
    if (count < -1) {
      return yield* Either.left(
        new InvalidFrameLength({ message: `Invalid frame length: ${count}`, length: count }),
      );
    }
    return { count, headerLength };
  });

const parseInteger = (text: string): Decoded<bigint> => {
  if (!INTEGER_PATTERN.test(text)) {
    return Either.left(new ParseIntError({ message: `Invalid integer: '${text}'` }));
  }
  const value = BigInt(text);
  return value < INT64_MIN || value > INT64_MAX
    ? Either.left(new ParseIntError({ message: `Integer out of range: '${text}'` }))
    : Either.right(value);
};

const parseDouble = (text: string): Decoded<number> => {
  switch (text.toLowerCase()) {
    case "inf":
    case "+inf":
      return Either.right(Number.POSITIVE_INFINITY);
    case "-inf":
      return Either.right(Number.NEGATIVE_INFINITY);
    case "nan":
      return Either.right(Number.NaN);
  }
  return FLOAT_PATTERN.test(text)
    ? Either.right(Number(text))
    : Either.left(new ParseFloatError({ message: `Invalid double: '${text}'` }));
};

/** Deepest aggregate nesting accepted before the frame is rejected. */
export const MAX_DEPTH = 512;

/** A scalar frame, or the header of an aggregate whose children follow it. */
type Step =
  | { readonly _tag: "Leaf"; readonly value: RESP.Value; readonly length: number }
  | {
      readonly _tag: "Open";
      readonly children: number;
      readonly length: number;
      readonly close: (children: ReadonlyArray<RESP.Value>) => Decoded<RESP.Value>;
    };

type StepDecoder = (bytes: Uint8Array, offset: number) => Decoded<Step>;

const leaf = (value: RESP.Value, length: number): Step => ({ _tag: "Leaf", value, length });

// a simple frame's payload is the text up to the first CRLF, so a lone CR or LF is malformed
const hasTerminator = (payload: Uint8Array): boolean =>
  payload.includes(CR) || payload.includes(LF);

const lineFrame =
  (parse: (payload: Uint8Array) => Decoded<RESP.Value>): StepDecoder =>
  (bytes, offset) =>
    Either.gen(function* () {
      const length = yield* lineLength(bytes, offset);
      const value = yield* parse(bytes.subarray(offset + 1, offset + length - 2));
      return leaf(value, length);
    });

const simpleText =
  (make: (value: string) => RESP.Value) =>
  (payload: Uint8Array): Decoded<RESP.Value> =>
    hasTerminator(payload)
      ? Either.left(new InvalidFrame({ message: "Simple frame must not contain CR or LF" }))
      : Either.map(decodeText(payload), make);

const bulkString: StepDecoder = (bytes, offset) =>
  Either.gen(function* () {
    const { count, headerLength } = yield* readHeader(bytes, offset);
    if (count === -1) {
      return leaf(new RESP.Null(), headerLength);
    }
    const length = headerLength + count + 2;
    if (offset + length > bytes.length) {
      return yield* Either.left(new NotComplete());
    }
    const end = offset + length;
    if (bytes[end - 2] !== CR || bytes[end - 1] !== LF) {
      return yield* Either.left(
        new InvalidFrame({ message: "Bulk string payload is not terminated by CRLF" }),
      );
    }
    return leaf(RESP.fromBytes(bytes.slice(offset + headerLength, end - 2)), length);
  });

const aggregate =
  (
    perEntry: number,
    close: (children: ReadonlyArray<RESP.Value>) => Decoded<RESP.Value>,
  ): StepDecoder =>
  (bytes, offset) =>
    Either.map(readHeader(bytes, offset), ({ count, headerLength }): Step =>
      count === -1
        ? leaf(new RESP.Null(), headerLength)
        : { _tag: "Open", children: count * perEntry, length: headerLength, close },
    );

const mapKey = (frame: RESP.Value): Decoded<string> => {
  switch (frame._tag) {
    case "SimpleString":
      return Either.right(frame.value);
    case "BulkString":
      return decodeText(frame.value);
    default:
      return Either.left(
        new InvalidFrame({ message: `Map key must be a string, got ${frame._tag}` }),
      );
  }
};

const decoders: ReadonlyMap<number, StepDecoder> = new Map(
  Object.entries({
    "+": lineFrame(simpleText((value) => new RESP.SimpleString({ value }))),
    "-": lineFrame(simpleText((value) => new RESP.SimpleError({ value }))),
    ":": lineFrame((payload) =>
      Either.map(parseInteger(ascii(payload)), (value) => new RESP.Integer({ value })),
    ),
    _: lineFrame((payload) =>
      payload.length === 0
        ? Either.right(new RESP.Null())
        : Either.left(new InvalidFrame({ message: "Null frame must have an empty payload" })),
    ),
    "#": lineFrame((payload) => {
      switch (ascii(payload)) {
        case "t":
          return Either.right(new RESP.Boolean({ value: true }));
        case "f":
          return Either.right(new RESP.Boolean({ value: false }));
        default:
          return Either.left(new InvalidFrame({ message: "Boolean must be 't' or 'f'" }));
      }
    }),
    ",": lineFrame((payload) =>
      Either.map(parseDouble(ascii(payload)), (value) => new RESP.Double({ value })),
    ),
    $: bulkString,
    "*": aggregate(1, (value) => Either.right(new RESP.Array({ value }))),
    "~": aggregate(1, (value) => Either.right(new RESP.Set({ value }))),
    "%": aggregate(2, (children) =>
      Either.gen(function* () {
        const entries: Array<readonly [string, RESP.Value]> = [];
        for (let i = 0; i < children.length; i += 2) {
          entries.push([yield* mapKey(children[i]), children[i + 1]]);
        }
        return RESP.Map.fromEntries(entries);
      }),
    ),
  }).map(([marker, decoder]) => [marker.charCodeAt(0), decoder] as const),
);

const readStep = (bytes: Uint8Array, offset: number): Decoded<Step> => {
  if (offset >= bytes.length) {
    return Either.left(new NotComplete());
  }
  const decoder = decoders.get(bytes[offset]);
  return decoder === undefined
    ? Either.left(
        new InvalidFrameType({
          message: `Unknown frame type marker '${String.fromCharCode(bytes[offset])}'`,
        }),
      )
    : decoder(bytes, offset);
};

interface OpenAggregate {
  readonly expected: number;
  readonly children: Array<RESP.Value>;
  readonly close: (children: ReadonlyArray<RESP.Value>) => Decoded<RESP.Value>;
}

interface Read {
  readonly value: RESP.Value;
  readonly length: number;
}

/**
 * Reads the frame starting at `offset` in a single pass. Aggregates are kept
 * on an explicit stack, so nesting depth is bounded by `MAX_DEPTH` rather
 * than by the call stack.
 */
const readFrame = (bytes: Uint8Array, offset: number): Decoded<Read> => {
  const open: Array<OpenAggregate> = [];
  let position = offset;
  for (;;) {
    const step = readStep(bytes, position);
    if (Either.isLeft(step)) {
      return Either.left(step.left);
    }
    const next = step.right;
    position += next.length;

    let value: RESP.Value;
    if (next._tag === "Leaf") {
      value = next.value;
    } else if (next.children > 0) {
      if (open.length >= MAX_DEPTH) {
        return Either.left(
          new InvalidFrame({ message: `Frame nesting exceeds ${MAX_DEPTH} levels` }),
        );
      }
      open.push({ expected: next.children, children: [], close: next.close });
      continue;
    } else {
      const closed = next.close([]);
      if (Either.isLeft(closed)) {
        return Either.left(closed.left);
      }
      value = closed.right;
    }

    // hand the finished value to its parent, closing every aggregate it completes
    for (;;) {
      const parent = open.at(-1);
      if (parent === undefined) {
        return Either.right({ value, length: position - offset });
      }
      parent.children.push(value);
      if (parent.children.length < parent.expected) {
        break;
      }
      open.pop();
      const closed = parent.close(parent.children);
      if (Either.isLeft(closed)) {
        return Either.left(closed.left);
      }
      value = closed.right;
    }
  }
};

/**
 * Measures the frame starting at `offset` without consuming anything.
 * Fails with `NotComplete` while any part of it is still missing.
 */
export function expectLength(bytes: Uint8Array, offset = 0): Decoded<number> {
  return Either.map(readFrame(bytes, offset), ({ length }) => length);
}

/**
 * Decodes one frame from the front of the buffer and removes its bytes.
 * On failure, `NotComplete` included, the buffer is left untouched.
 */
export const decode = (buffer: RespBuffer): Decoded<RESP.Value> =>
  Either.map(readFrame(buffer.bytes, 0), ({ value, length }) => {
    buffer.advance(length);
    return value;
  });
