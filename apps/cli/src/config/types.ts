export type OvercallConfig = {
  /** Path of the JSON command manifest. */
  manifest: string;
  /** Type name of the caller issuing the invocation, e.g. `ConsoleCaller`. */
  caller: string;
  callee: string;
  args: string[];
  /** Print the resolved call as JSON instead of a summary. */
  json: boolean;
  color: boolean;
};
