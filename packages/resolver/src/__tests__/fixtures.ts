import { createCall, rawArgument, type CommandCaller, type ValueArgument } from "../call/command-call.js";
import { TypeHierarchy } from "../types/type-hierarchy.js";
import { nominalType } from "../types/type-descriptor.js";

export const CALLER_TYPE = nominalType("Caller");
export const CONSOLE_CALLER_TYPE = nominalType("ConsoleCaller");
export const MEMBER_CALLER_TYPE = nominalType("MemberCaller");
export const CONTACT_TYPE = nominalType("Contact");
export const USER_TYPE = nominalType("User");
export const MEMBER_TYPE = nominalType("Member");

export const createTestHierarchy = (): TypeHierarchy =>
  TypeHierarchy.withPrimitives()
    .declare("Caller")
    .declare("ConsoleCaller", ["Caller"])
    .declare("MemberCaller", ["Caller"])
    .declare("Contact")
    .declare("User", ["Contact"])
    .declare("Member", ["User"]);

export const consoleCaller: CommandCaller = { type: CONSOLE_CALLER_TYPE, name: "console" };
export const memberCaller: CommandCaller = { type: MEMBER_CALLER_TYPE, name: "alice" };

export const callOf = (
  calleeName: string,
  args: readonly (string | ValueArgument)[],
  caller: CommandCaller = consoleCaller,
) =>
  createCall({
    caller,
    calleeName,
    valueArguments: args.map((arg) => (typeof arg === "string" ? rawArgument(arg) : arg)),
  });

export const noop = () => undefined;
