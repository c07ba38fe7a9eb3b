import { Effect, Either, pipe, Stream } from "effect";
import type { RESP } from "../RESP.js";
import { RespBuffer } from "./Buffer.js";
import {
  decode,
  type DecodeError,
  InvalidFrame,
  InvalidFrameLength,
  InvalidFrameType,
  NotComplete,
  ParseFloatError,
  ParseIntError,
  Utf8Error,
} from "./Decoder.js";
import { encode } from "./Encoder.js";

export { RespBuffer } from "./Buffer.js";
export * from "./Decoder.js";
export { encode } from "./Encoder.js";

export const isDecodeError = (u: unknown): u is DecodeError =>
  u instanceof NotComplete ||
  u instanceof InvalidFrameType ||
  u instanceof InvalidFrame ||
  u instanceof InvalidFrameLength ||
  u instanceof ParseIntError ||
  u instanceof ParseFloatError ||
  u instanceof Utf8Error;

/**
 * Decodes every complete frame in the buffer. Stops at the first frame that
 * is still incomplete, or right after the first protocol error.
 */
export const drain = (buffer: RespBuffer): Array<Either.Either<RESP.Value, DecodeError>> => {
  const results: Array<Either.Either<RESP.Value, DecodeError>> = [];
  while (buffer.length > 0) {
    const result = decode(buffer);
    if (Either.isLeft(result) && result.left._tag === "NotComplete") {
      break;
    }
    results.push(result);
    if (Either.isLeft(result)) {
      break;
    }
  }
  return results;
};

export function decodeFromWireFormat<E, R>(
  input: Stream.Stream<Uint8Array, E, R>
): Stream.Stream<RESP.Value, E | DecodeError, R> {
  return Stream.suspend(() => {
    const buffer = new RespBuffer();
    return pipe(
      input,
      Stream.mapConcat((chunk) => {
        buffer.append(chunk);
        return drain(buffer);
      }),
      Stream.mapEffect(
        (result): Effect.Effect<RESP.Value, DecodeError> =>
          Either.isRight(result) ? Effect.succeed(result.right) : Effect.fail(result.left)
      )
    );
  });
}

export function encodeToWireFormat<E, R>(
  input: Stream.Stream<RESP.Value, E, R>
): Stream.Stream<Uint8Array, E, R> {
  return Stream.map(input, encode);
}
