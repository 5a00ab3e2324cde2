export interface Logger {
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  /** Returns a logger whose output is tagged with `scope` nested under this logger's scope. */
  child(scope: string): Logger;
}

const toStructuredLogArgs = (message: string, context?: Record<string, unknown>): [string, Record<string, unknown>] => {
  if (context && Object.keys(context).length > 0) {
    return [message, context];
  }
  return [message, {}];
};

/** Scopes nest with `:`, so the index logs as `[search:index]` under the default root. */
export const createConsoleLogger = (scope = "search"): Logger => {
  const prefix = `[${scope}]`;
  return {
    info(message, context) {
      const [msg, ctx] = toStructuredLogArgs(message, context);
      console.info(prefix, msg, ctx);
    },
    warn(message, context) {
      const [msg, ctx] = toStructuredLogArgs(message, context);
      console.warn(prefix, msg, ctx);
    },
    error(message, context) {
      const [msg, ctx] = toStructuredLogArgs(message, context);
      console.error(prefix, msg, ctx);
    },
    child(childScope) {
      return createConsoleLogger(`${scope}:${childScope}`);
    }
  };
};

export const createNoopLogger = (): Logger => {
  const logger: Logger = {
    info() {},
    warn() {},
    error() {},
    child: () => logger
  };
  return logger;
};
