// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

/**
 * Logger interface used by workers, the actor registry and the generator.
 *
 * Provides fluent API for logging at different levels.
 * All methods return the logger instance for method chaining.
 *
 * A logger is supplied through ActorConfig or SynthesisOptions.
 */
export interface Logger {
  /**
   * Logs a debug message.
   * @param args Arguments to log
   * @returns This logger for chaining
   */
  debug(...args: unknown[]): Logger

  /**
   * Logs an error message.
   * @param args Arguments to log
   * @returns This logger for chaining
   */
  error(...args: unknown[]): Logger

  /**
   * Logs an info message.
   * @param args Arguments to log
   * @returns This logger for chaining
   */
  info(...args: unknown[]): Logger

  /**
   * Logs a warning.
   * @param args Arguments to log
   * @returns This logger for chaining
   */
  warn(...args: unknown[]): Logger

  /**
   * Logs a general message.
   * @param args Arguments to log
   * @returns This logger for chaining
   */
  log(...args: unknown[]): Logger
}

/**
 * Console-based logger implementation.
 *
 * Delegates to standard console methods (console.debug, console.error, etc.).
 */
class ConsoleLogger implements Logger {
  debug(...args: unknown[]): Logger {
    console.debug(...args)
    return this
  }

  error(...args: unknown[]): Logger {
    console.error(...args)
    return this
  }

  info(...args: unknown[]): Logger {
    console.info(...args)
    return this
  }

  warn(...args: unknown[]): Logger {
    console.warn(...args)
    return this
  }

  log(...args: unknown[]): Logger {
    console.log(...args)
    return this
  }
}

/**
 * Logger that discards everything. Handy for tests and for embedding
 * the generator in tools that own their own output.
 */
class SilentLogger implements Logger {
  debug(): Logger {
    return this
  }

  error(): Logger {
    return this
  }

  info(): Logger {
    return this
  }

  warn(): Logger {
    return this
  }

  log(): Logger {
    return this
  }
}

/**
 * Default logger instance used by the runtime and the generator.
 * Uses ConsoleLogger implementation.
 */
export const DefaultLogger: Logger = new ConsoleLogger()

/**
 * Logger instance that produces no output.
 */
export const NoOpLogger: Logger = new SilentLogger()
