/**
 * Logger utility for debugging and tracking execution
 */

import chalk from "chalk";
import { LogLevel } from "../types/logger.js";
import type { LogEntry } from "../types/logger.js";
import type { LogEmitter } from "../types/socket.js";

export { LogLevel };
export type { LogEntry };

// Steps forwarded to the browser, with the text shown there
const MAIN_STEPS: Record<string, string> = {
  "Turn Started": "Processando sua mensagem",
  "Model Deciding": "Pensando",
  "Tool Executing": "Consultando cardápio e carrinho",
  "Responding": "Preparando resposta",
  "Turn Completed": "Pronto",
  "Turn Failed": "Não foi possível concluir",
  "Session Reset": "Sessão reiniciada",
};

class Logger {
  private logLevel: LogLevel;
  private logs: LogEntry[] = [];
  private maxLogs: number = 1000; // Keep last 1000 logs in memory
  private emitter: LogEmitter | null = null;

  constructor(logLevel: LogLevel = LogLevel.INFO, emitter?: LogEmitter) {
    this.logLevel = logLevel;
    if (emitter) {
      this.emitter = emitter;
    }
  }

  /**
   * Attach the sink that receives per-session flow steps
   */
  setEmitter(emitter: LogEmitter | null): void {
    this.emitter = emitter;
  }

  private formatLog(level: LogLevel, message: string, context?: Record<string, unknown>, error?: Error): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };

    if (context) {
      entry.context = context;
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }

    return entry;
  }

  private addLog(entry: LogEntry): void {
    this.logs.push(entry);

    if (this.logs.length > this.maxLogs) {
      this.logs.shift();
    }
  }

  /**
   * Format context for display
   */
  private formatContext(context?: Record<string, unknown>): string {
    if (!context || Object.keys(context).length === 0) {
      return "";
    }

    try {
      const sanitized = JSON.stringify(context, (key, value: unknown) => {
        if (typeof value === "function") return "[Function]";
        if (value instanceof Error) return { name: value.name, message: value.message };
        if (key && key.length > 50) return "[Too Long]";
        return value;
      }, 2);

      return chalk.gray(`\nContext: ${sanitized}`);
    } catch {
      return chalk.gray(`\nContext: [Unable to serialize]`);
    }
  }

  private formatError(error?: Error): string {
    if (!error) return "";
    const errorName = chalk.red.bold(error.name);
    const errorMsg = chalk.red(error.message);
    const stack = error.stack ? chalk.gray(`\nStack: ${error.stack}`) : "";
    return `\n${chalk.red("Error:")} ${errorName}: ${errorMsg}${stack}`;
  }

  private formatTimestamp(timestamp: string): string {
    return chalk.gray(timestamp);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.logLevel <= LogLevel.DEBUG) {
      const entry = this.formatLog(LogLevel.DEBUG, message, context);
      this.addLog(entry);
      const levelTag = chalk.cyan.bold("[DEBUG]");
      console.debug(`${levelTag} ${this.formatTimestamp(entry.timestamp)} - ${chalk.cyan(message)}${this.formatContext(context)}`);
    }
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this.logLevel <= LogLevel.INFO) {
      const entry = this.formatLog(LogLevel.INFO, message, context);
      this.addLog(entry);
      const levelTag = chalk.blue.bold("[INFO]");
      console.log(`${levelTag} ${this.formatTimestamp(entry.timestamp)} - ${chalk.white(message)}${this.formatContext(context)}`);
    }
  }

  warn(message: string, context?: Record<string, unknown>, error?: Error): void {
    if (this.logLevel <= LogLevel.WARN) {
      const entry = this.formatLog(LogLevel.WARN, message, context, error);
      this.addLog(entry);
      const levelTag = chalk.yellow.bold("[WARN]");
      console.warn(`${levelTag} ${this.formatTimestamp(entry.timestamp)} - ${chalk.yellow(message)}${this.formatContext(context)}${this.formatError(error)}`);
    }
  }

  error(message: string, context?: Record<string, unknown>, error?: Error): void {
    if (this.logLevel <= LogLevel.ERROR) {
      const entry = this.formatLog(LogLevel.ERROR, message, context, error);
      this.addLog(entry);
      const levelTag = chalk.red.bold("[ERROR]");
      console.error(`${levelTag} ${this.formatTimestamp(entry.timestamp)} - ${chalk.red.bold(message)}${this.formatContext(context)}${this.formatError(error)}`);
    }
  }

  /**
   * Log AI action (model calls, generated queries)
   */
  aiAction(action: string, details: {
    model?: string;
    prompt?: string;
    response?: string;
    duration?: number;
    sessionId?: string;
    [key: string]: unknown;
  }): void {
    const context: Record<string, unknown> = {
      action,
      ...details,
    };

    // Truncate long prompts/responses for readability
    if (details.prompt && details.prompt.length > 500) {
      context.prompt = details.prompt.substring(0, 500) + "... [truncated]";
    }
    if (details.response && details.response.length > 500) {
      context.response = details.response.substring(0, 500) + "... [truncated]";
    }

    const entry = this.formatLog(LogLevel.INFO, `AI Action: ${action}`, context);
    this.addLog(entry);

    if (this.logLevel <= LogLevel.INFO) {
      const levelTag = chalk.magenta.bold("[AI]");
      const durationStr = details.duration ? chalk.cyan(` (${details.duration}ms)`) : "";
      console.log(`${levelTag} ${this.formatTimestamp(entry.timestamp)} - ${chalk.magenta.bold(action)}${durationStr}${this.formatContext(context)}`);
    }
  }

  /**
   * Log Cypher query execution
   */
  query(query: string, duration?: number, resultCount?: number, sessionId?: string): void {
    const entry = this.formatLog(LogLevel.INFO, "Cypher Query Execution", {
      query: query.length > 500 ? query.substring(0, 500) + "... [truncated]" : query,
      duration: duration !== undefined ? `${duration}ms` : undefined,
      resultCount,
    });
    this.addLog(entry);

    if (this.logLevel <= LogLevel.INFO) {
      const levelTag = chalk.green.bold("[CYPHER]");
      const durationStr = duration !== undefined ? chalk.cyan(` (${duration}ms)`) : "";
      const resultStr = resultCount !== undefined ? chalk.green(` - ${resultCount} results`) : "";
      const queryPreview = query.length > 100 ? query.substring(0, 100) + "..." : query;
      console.log(`${levelTag} ${this.formatTimestamp(entry.timestamp)}${durationStr}${resultStr}\n${chalk.gray(queryPreview)}`);
    }

    if (sessionId && this.emitter) {
      this.emitter.emitLog(
        sessionId,
        "Cypher Query Execution",
        `Consultando o cardápio${resultCount !== undefined ? ` (${resultCount} resultados)` : ""}`,
        { duration, resultCount }
      );
    }
  }

  /**
   * Log agent state transition; main steps are forwarded to the session's sockets
   */
  flowStep(step: string, details?: Record<string, unknown>, sessionId?: string): void {
    const entry = this.formatLog(LogLevel.INFO, `Flow Step: ${step}`, details);
    this.addLog(entry);

    if (this.logLevel <= LogLevel.INFO) {
      const levelTag = chalk.blue.bold("[FLOW]");
      console.log(`${levelTag} ${this.formatTimestamp(entry.timestamp)} - ${chalk.blue(step)}${this.formatContext(details)}`);
    }

    const friendly = MAIN_STEPS[step];
    if (sessionId && this.emitter && friendly) {
      this.emitter.emitLog(sessionId, step, friendly, details);
    }
  }

  getLogs(): LogEntry[] {
    return [...this.logs];
  }

  /**
   * Get logs at or above a level
   */
  getLogsByLevel(level: LogLevel): LogEntry[] {
    return this.logs.filter(log => log.level >= level);
  }

  clearLogs(): void {
    this.logs = [];
  }
}

/**
 * Map a LOG_LEVEL value to a level, defaulting to INFO
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  switch (value?.toUpperCase()) {
    case "DEBUG":
      return LogLevel.DEBUG;
    case "WARN":
      return LogLevel.WARN;
    case "ERROR":
      return LogLevel.ERROR;
    default:
      return LogLevel.INFO;
  }
}

export function createLogger(level: LogLevel, emitter?: LogEmitter): Logger {
  return new Logger(level, emitter);
}

export { Logger };
