// Minimal Result for the host-facing boundary

import { isScriptError, type ScriptError } from "./errors.js";

export type Ok<T> = { t: "ok"; v: T };
export type Err = { t: "err"; error: ScriptError };
export type Result<T> = Ok<T> | Err;

export const ok = <T>(v: T): Ok<T> => ({ t: "ok", v });
export const err = (error: ScriptError): Err => ({ t: "err", error });

export const isOk = <T>(r: Result<T>): r is Ok<T> => r.t === "ok";
export const isErr = <T>(r: Result<T>): r is Err => r.t === "err";

/** Unwraps or throws the carried error. */
export const unwrap = <T>(r: Result<T>): T => {
  if (isOk(r)) return r.v;
  throw r.error;
};

/** Runs `f`, turning a thrown ScriptError into an Err. Anything else is rethrown. */
export function attempt<T>(f: () => T): Result<T> {
  try {
    return ok(f());
  } catch (e) {
    if (isScriptError(e)) return err(e);
    throw e;
  }
}
