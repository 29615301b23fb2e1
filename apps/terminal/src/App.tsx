import { useState } from "react";
import { Box, Text, useApp, useInput } from "ink";
import Board from "./Board";
import { toCommand } from "./input";
import { applyCommand, createSession, viewOf, type SessionOptions } from "./session";

export type AppProps = SessionOptions;

function App({ demo, seed }: AppProps) {
  const { exit } = useApp();
  // The session owns the puzzle for the lifetime of the app; renders read snapshots of it.
  const [session] = useState(() => createSession({ demo, seed }));
  const [view, setView] = useState(() => viewOf(session));

  useInput((input, key) => {
    const command = toCommand(input, key);
    if (command === "noop") return;
    applyCommand(session, command);
    setView(viewOf(session));
    if (session.exit) exit();
  });

  return (
    <Box flexDirection="column" paddingX={1}>
      <Text bold>Sliding Puzzle</Text>
      <Text dimColor>Instructions: Arrows or WASD to move. R to restart. Q to quit.</Text>
      <Board grid={view.grid} solved={view.solved} />
      <Text>
        Moves: {view.moves} | Seed: {view.seed}
      </Text>
      <Text color={view.solved ? "green" : undefined}>{view.message}</Text>
    </Box>
  );
}

export default App;
