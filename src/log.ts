// stderr diagnostics, one prefixed line per message

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LineSink {
  write(chunk: string): unknown;
}

export interface LoggerOptions {
  quiet?: boolean;
  stream?: LineSink;
  prefix?: string;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const stream = options.stream ?? process.stderr;
  const prefix = options.prefix ?? "[netschema]";
  const write = (level: string, message: string): void => {
    for (const line of message.split("\n")) {
      stream.write(`${prefix} ${level}${line}\n`);
    }
  };
  return {
    info: (message) => {
      if (!options.quiet) write("", message);
    },
    warn: (message) => write("warning: ", message),
    error: (message) => write("error: ", message),
  };
}

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
