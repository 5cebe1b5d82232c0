/**
 * Logging Abstraction
 *
 * Integrations run both as scheduled GitHub Actions jobs (output through
 * @actions/core so groups and annotations render) and from a terminal
 * (plain console). The environment decides which one is used.
 */

import * as core from "@actions/core";

const isGitHubActions = (): boolean => {
  return process.env.GITHUB_ACTIONS === "true";
};

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: Error): void;
  debug(message: string): void;
  group(name: string): void;
  groupEnd(): void;
}

export interface LoggerOptions {
  /** Tag prepended to every message as `[prefix]`, usually the integration name */
  prefix?: string;
}

class ActionsLogger implements Logger {
  constructor(private readonly tag: string) {}

  info(message: string): void {
    core.info(this.tag + message);
  }

  warn(message: string): void {
    core.warning(this.tag + message);
  }

  error(message: string, error?: Error): void {
    if (error) {
      core.error(`${this.tag}${message}: ${error.message}`);
      if (error.stack) {
        core.debug(error.stack);
      }
    } else {
      core.error(this.tag + message);
    }
  }

  debug(message: string): void {
    core.debug(this.tag + message);
  }

  group(name: string): void {
    core.startGroup(this.tag + name);
  }

  groupEnd(): void {
    core.endGroup();
  }
}

class ConsoleLogger implements Logger {
  constructor(private readonly tag: string) {}

  info(message: string): void {
    console.log(this.tag + message);
  }

  warn(message: string): void {
    console.warn(`⚠️  ${this.tag}${message}`);
  }

  error(message: string, error?: Error): void {
    if (error) {
      console.error(`❌ ${this.tag}${message}:`, error);
    } else {
      console.error(`❌ ${this.tag}${message}`);
    }
  }

  debug(message: string): void {
    if (process.env.DEBUG) {
      console.log(`🔍 ${this.tag}${message}`);
    }
  }

  group(name: string): void {
    console.group(this.tag + name);
  }

  groupEnd(): void {
    console.groupEnd();
  }
}

/**
 * Create a logger for the current environment.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const tag = options.prefix ? `[${options.prefix}] ` : "";
  return isGitHubActions() ? new ActionsLogger(tag) : new ConsoleLogger(tag);
}

/**
 * Render a reconcile action as one log line of space-separated fields,
 * e.g. `create_label ocm_env=prod org_id=o1 cluster=c1 owner=team-a`.
 */
export function formatAction(action: string, ...fields: string[]): string {
  return [action, ...fields].join(" ");
}

/**
 * Default logger instance
 */
export const logger = createLogger();
