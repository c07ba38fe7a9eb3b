import { Options } from "@effect/cli";
import * as Command from "@effect/cli/Command";
import * as NodeSocketServer from "@effect/experimental/SocketServer/Node";
import { Config, Effect, Layer, Logger, LogLevel, pipe, Schema } from "effect";
import { main } from "./main.js";
import * as BasicInMemory from "./Storage/BasicInMemory.js";
import * as STMBackedInMemory from "./Storage/STMBackedInMemory.js";

const logLevelSchema: Schema.Schema<LogLevel.Literal> = Schema.Literal(
  ...LogLevel.allLevels.map((level) => level._tag)
);

const logLevel = Options.text("logLevel").pipe(
  Options.withSchema(logLevelSchema),
  Options.withDefault("Info")
);

const port = Options.integer("port").pipe(
  Options.withDefault(6379),
  Options.withFallbackConfig(Config.integer("PORT"))
);

const host = Options.text("host").pipe(
  Options.withDefault("0.0.0.0"),
  Options.withFallbackConfig(Config.string("HOST"))
);

const storageBackends = {
  stm: STMBackedInMemory.layer,
  basic: BasicInMemory.layer,
} as const;

const storage = Options.choice("storage", ["stm", "basic"]).pipe(
  Options.withDefault("stm"),
  Options.withFallbackConfig(Config.literal("stm", "basic")("STORAGE"))
);

const command = Command.make(
  "respkv",
  { logLevel, port, host, storage },
  ({ logLevel, port, host, storage }) =>
    pipe(
      main,
      Logger.withMinimumLogLevel(LogLevel.fromLiteral(logLevel)),
      Effect.provide(
        Layer.mergeAll(
          NodeSocketServer.layer({ port, host }),
          storageBackends[storage]
        )
      )
    )
);

export const run = Command.run(command, {
  name: "respkv",
  version: "0.1.0",
});
