// Trace output for variant scoring.
// Enable with OVERCALL_DEBUG_RESOLVE=1

const DEBUG =
  !!process.env.OVERCALL_DEBUG_RESOLVE && process.env.OVERCALL_DEBUG_RESOLVE !== "0";

let depth = 0;

export const pushResolve = (label?: string) => {
  if (DEBUG) {
    // eslint-disable-next-line no-console
    if (label) console.log(`${" ".repeat(depth * 2)}[resolve] ${label}`);
  }
  depth += 1;
};

export const popResolve = () => {
  depth = Math.max(0, depth - 1);
};

export const logResolve = (msg: string | (() => string)) => {
  if (!DEBUG) return;
  const text = typeof msg === "function" ? msg() : msg;
  // eslint-disable-next-line no-console
  console.log(`${" ".repeat(depth * 2)}[resolve] ${text}`);
};
