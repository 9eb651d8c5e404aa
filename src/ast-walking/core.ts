import { Environment } from "./environment.ts";
import type { NativeFunc } from "./value.ts";

export const nativeFuncs: Record<string, NativeFunc> = {
  clock: {
    type: "NativeFunc",
    name: "clock",
    arity: 0,
    fn: () => Date.now() / 1000,
  },
};

/** A fresh global frame holding the native functions */
export const createGlobals = (): Environment => {
  const globals = new Environment();
  for (const [name, nf] of Object.entries(nativeFuncs)) {
    globals.define(name, nf);
  }
  return globals;
};
