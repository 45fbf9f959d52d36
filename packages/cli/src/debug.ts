import createDebug from "debug";

export type Log = createDebug.Debugger;

export function createLog(namespace: string): Log {
  return createDebug(`unitcov:${namespace}`);
}
