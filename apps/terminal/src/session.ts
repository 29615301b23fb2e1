import { PuzzleState, demoGrid, type Grid } from "@fifteen/puzzle-engine";
import { BLANK_DIRECTION, isMoveCommand, type Command } from "./input";

export type SessionOptions = {
  demo?: boolean;
  seed?: string;
};

export type Session = {
  puzzle: PuzzleState;
  moves: number;
  message: string;
  exit: boolean;
};

export type SessionView = {
  grid: Grid;
  solved: boolean;
  moves: number;
  message: string;
  seed: string;
};

export const PLAY_MESSAGE = "Slide the tiles into order.";

const solvedMessage = (moves: number) => `Solved in ${moves} ${moves === 1 ? "move" : "moves"}!`;

export const createSession = ({ demo = false, seed }: SessionOptions = {}): Session => {
  const puzzle = demo ? PuzzleState.fromGrid(demoGrid()) : PuzzleState.shuffled({ seed });
  let message = demo ? `Demo layout loaded. ${PLAY_MESSAGE}` : PLAY_MESSAGE;
  if (puzzle.isSolved()) {
    message = "Dealt a solved board. Press R for a new one.";
  }
  return { puzzle, moves: 0, message, exit: false };
};

/** Runs one turn of the game loop against the session's puzzle. */
export const applyCommand = (session: Session, command: Command): void => {
  if (command === "noop") return;

  if (command === "quit") {
    session.exit = true;
    session.message = "Goodbye.";
    return;
  }

  if (command === "restart") {
    session.puzzle.restart();
    session.moves = 0;
    session.message = "New puzzle shuffled.";
    return;
  }

  if (isMoveCommand(command)) {
    if (!session.puzzle.applyMove(BLANK_DIRECTION[command])) {
      session.message = "Nothing can slide that way.";
      return;
    }
    session.moves++;
    session.message = session.puzzle.isSolved() ? solvedMessage(session.moves) : PLAY_MESSAGE;
  }
};

export const viewOf = (session: Session): SessionView => ({
  grid: session.puzzle.cells(),
  solved: session.puzzle.isSolved(),
  moves: session.moves,
  message: session.message,
  seed: session.puzzle.seed ?? "demo",
});
