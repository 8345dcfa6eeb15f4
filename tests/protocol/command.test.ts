import { describe, it, expect } from "vitest";
import { parseCommand, tokenize } from "../../src/protocol/command.js";

describe("tokenize", () => {
  it("splits on whitespace runs and drops empty tokens", () => {
    expect(tokenize("  @ha\tturn_on \n light1  ")).toEqual(["@ha", "turn_on", "light1"]);
  });

  it("returns no tokens for blank text", () => {
    expect(tokenize("   ")).toEqual([]);
  });
});

describe("parseCommand", () => {
  it("extracts action and target", () => {
    expect(parseCommand("@ha turn_on light1")).toEqual({
      kind: "command",
      command: { action: "turn_on", target: "light1" },
    });
  });

  it("ignores tokens after the target", () => {
    expect(parseCommand("@ha turn_on light1 please now")).toEqual({
      kind: "command",
      command: { action: "turn_on", target: "light1" },
    });
  });

  it("accepts a single tab or newline as a separator", () => {
    expect(parseCommand("@ha\tturn_off\nlight.kitchen")).toEqual({
      kind: "command",
      command: { action: "turn_off", target: "light.kitchen" },
    });
  });

  it("rejects runs of whitespace between tokens", () => {
    expect(parseCommand("@ha  turn_on light1")).toEqual({ kind: "no-match", reason: "no-trigger" });
    expect(parseCommand("@ha turn_on  light1")).toEqual({ kind: "no-match", reason: "no-trigger" });
    expect(parseCommand("@ha\t turn_on light1")).toEqual({ kind: "no-match", reason: "no-trigger" });
  });

  it("only treats ASCII whitespace as a separator", () => {
    expect(parseCommand("@ha\u00a0turn_on light1")).toEqual({ kind: "no-match", reason: "no-trigger" });
    expect(parseCommand("@ha turn_on\u2003light1").kind).toBe("no-match");
    expect(parseCommand("@ha\vturn_on light1")).toEqual({ kind: "no-match", reason: "no-trigger" });
  });

  it("keeps a target that only starts with a word character", () => {
    const result = parseCommand("@ha toggle switch.garage_door");
    expect(result.kind).toBe("command");
    if (result.kind === "command") {
      expect(result.command.target).toBe("switch.garage_door");
    }
  });

  it("reports missing arguments for two tokens", () => {
    expect(parseCommand("@ha turn_on")).toEqual({ kind: "no-match", reason: "missing-arguments" });
  });

  it("reports missing arguments for trailing whitespace only", () => {
    expect(parseCommand("@ha turn_on   ")).toEqual({
      kind: "no-match",
      reason: "missing-arguments",
    });
  });

  it("requires the marker at the start of the text", () => {
    expect(parseCommand("hello @ha turn_on light1")).toEqual({
      kind: "no-match",
      reason: "no-trigger",
    });
  });

  it("rejects leading whitespace before the marker", () => {
    expect(parseCommand(" @ha turn_on light1")).toEqual({ kind: "no-match", reason: "no-trigger" });
  });

  it("requires whitespace right after the marker", () => {
    expect(parseCommand("@hab turn_on light1")).toEqual({ kind: "no-match", reason: "no-trigger" });
    expect(parseCommand("@ha")).toEqual({ kind: "no-match", reason: "no-trigger" });
  });

  it("is case-sensitive about the marker", () => {
    expect(parseCommand("@HA turn_on light1")).toEqual({ kind: "no-match", reason: "no-trigger" });
  });

  it("rejects an action with non-word characters", () => {
    expect(parseCommand("@ha turn-on light1")).toEqual({ kind: "no-match", reason: "no-trigger" });
  });

  it("rejects a target that does not start with a word character", () => {
    expect(parseCommand("@ha turn_on .light1")).toEqual({ kind: "no-match", reason: "no-trigger" });
  });

  it("does not whitelist actions or targets", () => {
    expect(parseCommand("@ha self_destruct everything")).toEqual({
      kind: "command",
      command: { action: "self_destruct", target: "everything" },
    });
  });

  it("treats plain chat as no trigger", () => {
    expect(parseCommand("good morning")).toEqual({ kind: "no-match", reason: "no-trigger" });
    expect(parseCommand("")).toEqual({ kind: "no-match", reason: "no-trigger" });
  });
});
