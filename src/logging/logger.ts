import { redact } from './redaction.js';
import {
  LogDestination,
  LogLevel,
  LOG_LEVEL_ENV,
  parseLogLevel,
  type LogMeta,
  type LogTransport,
  type LogWriter,
  type Logger,
  type LoggerOptions,
} from './types.js';

export { LogDestination, LogLevel } from './types.js';

export class DefaultLogger implements Logger {
  // Defaults for this implementation of Logger
  static readonly defaultLevel = LogLevel.Info;
  static readonly defaultDestination = LogDestination.StdOut;
  static readonly defaultRedactPaths: string[] = [];

  private readonly context: LogMeta;
  private readonly writeMessage: LogWriter;
  private readonly transport: LogTransport;

  public readonly destination: LogDestination;
  public redactPaths: string[];
  public level: LogLevel;

  constructor(
    context: LogMeta,
    options?: LoggerOptions,
    transport: LogTransport = console
  ) {
    this.context = context;
    this.level = options?.level ?? DefaultLogger.defaultLevel;
    this.destination = options?.destination ?? DefaultLogger.defaultDestination;
    this.redactPaths = options?.redactPaths ?? DefaultLogger.defaultRedactPaths;
    this.transport = transport;
    this.writeMessage = transport[this.destination].bind(transport);
  }

  /**
   * Build a logger whose level comes from `OAUTH_LOG_LEVEL`, falling back to
   * Info when unset or unrecognized.
   */
  static fromEnvironment(
    context: LogMeta,
    options: Omit<LoggerOptions, 'level'> = {},
    env: NodeJS.ProcessEnv = process.env
  ): DefaultLogger {
    return new DefaultLogger(context, {
      ...options,
      level: parseLogLevel(env[LOG_LEVEL_ENV], DefaultLogger.defaultLevel),
    });
  }

  child(context: LogMeta): Logger {
    const childContext = { ...this.context, ...context };
    const childOptions = {
      level: this.level,
      redactPaths: this.redactPaths,
      destination: this.destination,
    };

    return new DefaultLogger(childContext, childOptions, this.transport);
  }

  fatal(msg: string, meta?: LogMeta): void {
    this.log(LogLevel.Fatal, msg, meta);
  }

  error(msg: string, meta?: LogMeta): void {
    this.log(LogLevel.Error, msg, meta);
  }

  warn(msg: string, meta?: LogMeta): void {
    this.log(LogLevel.Warn, msg, meta);
  }

  info(msg: string, meta?: LogMeta): void {
    this.log(LogLevel.Info, msg, meta);
  }

  debug(msg: string, meta?: LogMeta): void {
    this.log(LogLevel.Debug, msg, meta);
  }

  trace(msg: string, meta?: LogMeta): void {
    this.log(LogLevel.Trace, msg, meta);
  }

  private log(level: LogLevel, msg: string, meta?: LogMeta): void {
    if (this.level === LogLevel.Silent) {
      return;
    }

    if (level <= this.level) {
      const message = {
        message: msg,
        level: LogLevel[level],
        ...redact(this.context, this.redactPaths),
        ...redact(meta, this.redactPaths),
      };

      this.writeMessage(message);
    }
  }
}
