import type { Key } from "ink";
import type { Direction } from "@fifteen/puzzle-engine";

export type MoveCommand = "move-up" | "move-down" | "move-left" | "move-right";

export type Command = MoveCommand | "restart" | "quit" | "noop";

export type KeyState = Pick<Key, "upArrow" | "downArrow" | "leftArrow" | "rightArrow" | "escape" | "ctrl">;

// Commands name the way a tile slides, so the blank travels the opposite way.
export const BLANK_DIRECTION: Record<MoveCommand, Direction> = {
  "move-up": "down",
  "move-down": "up",
  "move-left": "right",
  "move-right": "left",
};

const LETTERS: Record<string, Command> = {
  w: "move-up",
  s: "move-down",
  a: "move-left",
  d: "move-right",
  r: "restart",
  q: "quit",
};

export const isMoveCommand = (command: Command): command is MoveCommand => command in BLANK_DIRECTION;

export const toCommand = (input: string, key: KeyState): Command => {
  if (key.upArrow) return "move-up";
  if (key.downArrow) return "move-down";
  if (key.leftArrow) return "move-left";
  if (key.rightArrow) return "move-right";
  if (key.escape) return "quit";
  if (key.ctrl || input.length !== 1) return "noop";
  return LETTERS[input.toLowerCase()] ?? "noop";
};
