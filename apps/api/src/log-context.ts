import { AsyncLocalStorage } from "node:async_hooks";

export type LogContext = {
  requestId?: string;
  /** Explorer view serving the request (bundles, history, metrics). */
  view?: string;
};

const storage = new AsyncLocalStorage<LogContext>();

export function setLogContext(context: LogContext): void {
  storage.enterWith({ ...storage.getStore(), ...context });
}

export function getLogContext(): LogContext | undefined {
  return storage.getStore();
}

export function runWithLogContext<T>(context: LogContext, fn: () => T): T {
  return storage.run(context, fn);
}
