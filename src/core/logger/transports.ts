/**
 * Logger Transports
 * Pino transport targets for the configured outputs
 */

import pino from "pino";
import { FileTransportConfig, LogFormat, LogLevel } from "./config";

/**
 * Console target: pino-pretty for humans, raw JSON lines on stdout otherwise
 */
export function createConsoleTransport(format: LogFormat, level: LogLevel): pino.TransportTargetOptions {
  if (format === "pretty") {
    return {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
      },
      level,
    };
  }

  return {
    target: "pino/file",
    options: { destination: 1 },
    level,
  };
}

/**
 * Create file transport configuration
 */
export function createFileTransport(config: FileTransportConfig): pino.TransportTargetOptions {
  return {
    target: "pino/file",
    options: {
      destination: config.path,
      mkdir: true,
      sync: false,
    },
    level: "info",
  };
}
