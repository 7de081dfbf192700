import { describe, expect, it, vi } from "vitest";
import { formatSummary, formatValue, printJson, stringifyOutput } from "../output.js";

describe("cli output", () => {
  it("serializes bigint arguments of a summary", () => {
    expect(
      JSON.parse(
        stringifyOutput({
          command: "sum",
          signature: "sum(vararg values: Array<Long>)",
          arguments: [[1n, 2n]],
        })
      )
    ).toEqual({
      command: "sum",
      signature: "sum(vararg values: Array<Long>)",
      arguments: [["1n", "2n"]],
    });
  });

  it("prints JSON indented by two spaces", () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    try {
      printJson({ command: "foo", arguments: [5n] });

      expect(logSpy).toHaveBeenCalledWith(
        '{\n  "command": "foo",\n  "arguments": [\n    "5n"\n  ]\n}'
      );
    } finally {
      logSpy.mockRestore();
    }
  });

  it("formats single values inline", () => {
    expect(formatValue("add")).toBe('"add"');
    expect(formatValue(5)).toBe("5");
    expect(formatValue(Number.NaN)).toBe("NaN");
    expect(formatValue(9n)).toBe("9n");
    expect(formatValue(undefined)).toBe("undefined");
    expect(formatValue([1n, 2n])).toBe('["1n","2n"]');
  });

  it("summarizes a resolved call", () => {
    expect(
      formatSummary({
        command: "kick",
        signature: "kick(<receiver>: MemberCaller, target: String)",
        receiver: "MemberCaller",
        description: "remove a member",
        arguments: ["bob"],
      })
    ).toBe(
      [
        "resolved kick(<receiver>: MemberCaller, target: String)",
        "  receiver: MemberCaller",
        '  arguments: ("bob")',
        "  remove a member",
      ].join("\n")
    );
  });
});
