import * as SocketServer from "@effect/experimental/SocketServer";
import { Socket } from "@effect/platform";
import { Channel, Effect, Either, pipe, Stream } from "effect";
import { parseCommand } from "./Command.js";
import { execute } from "./Executor.js";
import {
  decodeFromWireFormat,
  encodeToWireFormat,
  isDecodeError,
} from "./Parser/index.js";
import { RESP } from "./RESP.js";
import type { Storage } from "./Storage.js";

export const main = Effect.gen(function* () {
  const server = yield* SocketServer.SocketServer;
  yield* Effect.logInfo(
    `Server started on port: ${
      server.address._tag === "TcpAddress" ? server.address.port : "unknown"
    }`
  );
  yield* server.run(handleConnection);
}).pipe(
  Effect.catchAll((e) => Effect.logError("Uncaught error", e)),
  Effect.catchAllDefect((e) => Effect.logFatal("Defect", e))
);

const handleConnection = Effect.fn("handleConnection")(
  function* (socket: Socket.Socket) {
    yield* Effect.logInfo("New connection");
    const channel = Socket.toChannel<never>(socket);

    const rawInputStream = Stream.never.pipe(
      Stream.pipeThroughChannel(channel)
    );
    const rawOutputSink = Channel.toSink(channel);

    yield* pipe(
      rawInputStream,
      serveConnection,
      Stream.run(rawOutputSink),
      Effect.catchAll((error) =>
        Effect.logWarning("Connection failed", error)
      )
    );
  },
  Effect.onExit(() => Effect.logInfo("Connection closed")),
  Effect.scoped
);

/**
 * Bytes in, bytes out. Replies come back in request order; a protocol error
 * ends the stream after one final error reply.
 */
export function serveConnection<E, R>(
  input: Stream.Stream<Uint8Array, E, R>
): Stream.Stream<Uint8Array, E, R | Storage> {
  return pipe(
    input,
    decodeFromWireFormat,
    Stream.tap((value) => Effect.logTrace("Received RESP: ", value._tag)),
    processRESP,
    Stream.catchAll((error): Stream.Stream<RESP.Value, E> =>
      isDecodeError(error)
        ? Stream.fromEffect(
            Effect.logWarning("Protocol error", error.message).pipe(
              Effect.as(RESP.error(`ERR Protocol error: ${error.message}`))
            )
          )
        : Stream.fail(error)
    ),
    Stream.tap((value) => Effect.logTrace("Sending RESP: ", value._tag)),
    encodeToWireFormat
  );
}

export function processRESP<E, R>(
  input: Stream.Stream<RESP.Value, E, R>
): Stream.Stream<RESP.Value, E, R | Storage> {
  return pipe(input, Stream.mapEffect(handleFrame));
}

const handleFrame = (
  frame: RESP.Value
): Effect.Effect<RESP.Value, never, Storage> =>
  Effect.gen(function* () {
    const parsed = parseCommand(frame);
    if (Either.isLeft(parsed)) {
      yield* Effect.logWarning(
        "Rejected command",
        parsed.left._tag,
        parsed.left.message
      );
      return RESP.error(`ERR ${parsed.left.message}`);
    }
    yield* Effect.logTrace("Parsed command: ", parsed.right._tag);
    return yield* execute(parsed.right);
  });
