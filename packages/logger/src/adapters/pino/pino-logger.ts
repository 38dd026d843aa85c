import pino, {
  type DestinationStream,
  type Logger as PinoLoggerBase,
  type LoggerOptions as PinoOptions,
} from "pino"
import { errWithCause } from "pino-std-serializers"
import type { LogContext, LogContextPatch, LogMeta } from "../../ports/log-context"
import type { LogLevelName } from "../../ports/log-level"
import type { Logger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"

export type PinoLoggerDeps = {
  /**
   * Base pino logger to create children from (inherits config).
   * When provided, this adapter will only add `context` via `.child(...)`.
   */
  base?: PinoLoggerBase

  /**
   * Optional destination stream for pino output.
   */
  destination?: DestinationStream
}

export class PinoLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  protected readonly logger: PinoLoggerBase

  constructor(
    protected readonly deps: Readonly<PinoLoggerDeps> = {},
    protected readonly opts: Partial<LoggerOptions> = {},
    context: LogContextPatch = {},
  ) {
    this.logger = this.init(context)
  }

  private init(context: LogContextPatch): PinoLoggerBase {
    if (this.deps.base) return this.deps.base.child(context)

    const usePretty = this.opts.prettify === true && !this.deps.destination

    const pinoOpts: PinoOptions = {
      ...(this.opts.level && { level: this.opts.level }),
      serializers: { err: errWithCause },
      ...(usePretty && {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss.l",
            ignore: "hostname",
          },
        },
      }),
    }

    const root = this.deps.destination
      ? pino(pinoOpts, this.deps.destination)
      : pino(pinoOpts)

    return root.child(context)
  }

  private emit(level: LogLevelName, message: string, meta?: LogMeta<TContext>): void {
    this.logger[level](meta ?? {}, message)
  }

  trace(message: string, meta?: LogMeta<TContext>): void {
    this.emit("trace", message, meta)
  }

  debug(message: string, meta?: LogMeta<TContext>): void {
    this.emit("debug", message, meta)
  }

  info(message: string, meta?: LogMeta<TContext>): void {
    this.emit("info", message, meta)
  }

  warn(message: string, meta?: LogMeta<TContext>): void {
    this.emit("warn", message, meta)
  }

  error(message: string, meta?: LogMeta<TContext>): void {
    this.emit("error", message, meta)
  }

  fatal(message: string, meta?: LogMeta<TContext>): void {
    this.emit("fatal", message, meta)
  }

  child<U extends LogContextPatch>(context: U): Logger<TContext & U> {
    return new PinoLogger<TContext & U>({ base: this.logger }, this.opts, context)
  }
}

export function createPinoLogger<TContext extends LogContext = LogContext>(
  deps: PinoLoggerDeps = {},
  opts: Partial<LoggerOptions> = {},
  context: LogContextPatch = {},
): Logger<TContext> {
  return new PinoLogger<TContext>(deps, opts, context)
}
