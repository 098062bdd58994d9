/**
 * Logger Transports
 * In-process Pino destinations for the configured output targets
 */

import pino from "pino";
import pinoPretty from "pino-pretty";
import { FileTransportConfig, LogFormat, LoggerConfig } from "./config";

function createConsoleStream(format: LogFormat, fd: 1 | 2): pino.DestinationStream {
  if (format === "pretty") {
    return pinoPretty({
      colorize: true,
      translateTime: "SYS:standard",
      ignore: "pid,hostname",
      destination: fd,
    });
  }
  return pino.destination(fd);
}

/**
 * Create file destination
 */
export function createFileStream(config: FileTransportConfig): pino.DestinationStream {
  return pino.destination({
    dest: config.path,
    mkdir: true,
    sync: false,
  });
}

/**
 * Resolve where log lines go: an injected stream, or console plus optional file
 */
export function createDestination(config: LoggerConfig): pino.DestinationStream {
  if (config.destination) {
    return config.destination;
  }

  const consoleStream = createConsoleStream(config.format, config.stream === "stderr" ? 2 : 1);
  if (!config.file?.enabled) {
    return consoleStream;
  }

  return pino.multistream([
    { level: config.level === "silent" ? "fatal" : config.level, stream: consoleStream },
    { level: "info", stream: createFileStream(config.file) },
  ]);
}
