import {
  LogPrinter,
  type LogLevels,
  type PrintStrategy,
  type PrintableLog,
} from "./LogPrinter";

export type { LogLevels, PrintStrategy } from "./LogPrinter";

export interface ILogInfo {
  source?: string;
  error?: unknown;
  data?: Record<string, unknown>;
  [key: string]: unknown;
}

export type ILog = PrintableLog;

export type LogListener = (log: ILog) => void | Promise<void>;

export interface LoggerOptions {
  printThreshold: null | LogLevels;
  printStrategy: PrintStrategy;
  useColors?: boolean;
}

export class Logger {
  private readonly printThreshold: null | LogLevels;
  private readonly printStrategy: PrintStrategy;
  private readonly useColors: boolean;
  private readonly boundContext: Record<string, unknown>;
  private readonly printer: LogPrinter;
  private readonly source?: string;
  // Children created through with() delegate listeners and printing here
  private rootLogger?: Logger;
  private localListeners: LogListener[] = [];

  public static Severity: Readonly<Record<LogLevels, number>> = {
    trace: 0,
    debug: 1,
    info: 2,
    warn: 3,
    error: 4,
    critical: 5,
  };

  constructor(
    options: LoggerOptions,
    boundContext: Record<string, unknown> = {},
    source?: string,
    printer?: LogPrinter,
  ) {
    this.boundContext = { ...boundContext };
    this.printThreshold = options.printThreshold;
    this.printStrategy = options.printStrategy;
    this.useColors = options.useColors ?? Logger.detectColorSupport();
    this.source = source;
    this.printer =
      printer ??
      new LogPrinter({
        strategy: this.printStrategy,
        useColors: this.useColors,
      });
  }

  private static detectColorSupport(): boolean {
    if (process.env.NO_COLOR) return false;
    return Boolean(process.stdout?.isTTY);
  }

  /**
   * Creates a new logger instance with additional bound context
   */
  public with({
    source,
    additionalContext,
  }: {
    source?: string;
    additionalContext?: Record<string, unknown>;
  }): Logger {
    const child = new Logger(
      {
        printThreshold: this.printThreshold,
        printStrategy: this.printStrategy,
        useColors: this.useColors,
      },
      { ...this.boundContext, ...additionalContext },
      source ?? this.source,
      this.printer,
    );
    child.rootLogger = this.rootLogger ?? this;
    return child;
  }

  public async log(
    level: LogLevels,
    message: unknown,
    logInfo: ILogInfo = {},
  ): Promise<void> {
    const { source, error, data, ...context } = logInfo;

    const log: ILog = {
      level,
      message,
      source: source ?? this.source,
      timestamp: new Date(),
      error: error === undefined ? undefined : Logger.extractErrorInfo(error),
      data,
      context: { ...this.boundContext, ...context },
    };

    const root = this.rootLogger ?? this;
    await root.triggerLogListeners(log);

    if (root.canPrint(level)) {
      root.printer.print(log);
    }
  }

  private static extractErrorInfo(error: unknown): NonNullable<ILog["error"]> {
    if (error instanceof Error) {
      return {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }

    return {
      name: "UnknownError",
      message: String(error),
    };
  }

  public async trace(message: unknown, logInfo?: ILogInfo) {
    await this.log("trace", message, logInfo);
  }

  public async debug(message: unknown, logInfo?: ILogInfo) {
    await this.log("debug", message, logInfo);
  }

  public async info(message: unknown, logInfo?: ILogInfo) {
    await this.log("info", message, logInfo);
  }

  public async warn(message: unknown, logInfo?: ILogInfo) {
    await this.log("warn", message, logInfo);
  }

  public async error(message: unknown, logInfo?: ILogInfo) {
    await this.log("error", message, logInfo);
  }

  public async critical(message: unknown, logInfo?: ILogInfo) {
    await this.log("critical", message, logInfo);
  }

  /**
   * @param listener - A listener that will be triggered for every log,
   * regardless of the print threshold.
   */
  public onLog(listener: LogListener) {
    (this.rootLogger ?? this).localListeners.push(listener);
  }

  private canPrint(level: LogLevels): boolean {
    if (this.printThreshold === null) {
      return false;
    }
    return Logger.Severity[level] >= Logger.Severity[this.printThreshold];
  }

  private async triggerLogListeners(log: ILog) {
    for (const listener of this.localListeners) {
      try {
        await listener(log);
      } catch (error) {
        // A failing listener must not break the caller
        this.printer.print({
          level: "error",
          message: "Error in log listener",
          timestamp: new Date(),
          error: Logger.extractErrorInfo(error),
        });
      }
    }
  }
}
