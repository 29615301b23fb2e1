import { describe, expect, it } from "vitest";
import { isMoveCommand, toCommand, type KeyState } from "./input";

const noKeys: KeyState = {
  upArrow: false,
  downArrow: false,
  leftArrow: false,
  rightArrow: false,
  escape: false,
  ctrl: false,
};

describe("toCommand", () => {
  it("maps arrow keys to moves", () => {
    expect(toCommand("", { ...noKeys, upArrow: true })).toBe("move-up");
    expect(toCommand("", { ...noKeys, downArrow: true })).toBe("move-down");
    expect(toCommand("", { ...noKeys, leftArrow: true })).toBe("move-left");
    expect(toCommand("", { ...noKeys, rightArrow: true })).toBe("move-right");
  });

  it("maps WASD in either case", () => {
    expect(toCommand("w", noKeys)).toBe("move-up");
    expect(toCommand("S", noKeys)).toBe("move-down");
    expect(toCommand("a", noKeys)).toBe("move-left");
    expect(toCommand("D", noKeys)).toBe("move-right");
  });

  it("maps restart and quit", () => {
    expect(toCommand("r", noKeys)).toBe("restart");
    expect(toCommand("R", noKeys)).toBe("restart");
    expect(toCommand("q", noKeys)).toBe("quit");
    expect(toCommand("Q", noKeys)).toBe("quit");
    expect(toCommand("", { ...noKeys, escape: true })).toBe("quit");
  });

  it("ignores everything else", () => {
    expect(toCommand("x", noKeys)).toBe("noop");
    expect(toCommand("qq", noKeys)).toBe("noop");
    expect(toCommand("", noKeys)).toBe("noop");
    expect(toCommand("r", { ...noKeys, ctrl: true })).toBe("noop");
  });
});

describe("isMoveCommand", () => {
  it("only accepts the four moves", () => {
    expect(isMoveCommand("move-left")).toBe(true);
    expect(isMoveCommand("restart")).toBe(false);
    expect(isMoveCommand("noop")).toBe(false);
  });
});
