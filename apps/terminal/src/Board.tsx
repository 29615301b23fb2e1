import { Box, Text } from "ink";
import type { Grid } from "@fifteen/puzzle-engine";

const TILE_WIDTH = 6;
const TILE_HEIGHT = 3;

export const formatTile = (value: number) => ` ${String(value).padStart(2, "0")}`;

type BoardProps = {
  grid: Grid;
  solved: boolean;
};

function Board({ grid, solved }: BoardProps) {
  return (
    <Box flexDirection="column" borderStyle="bold" borderColor={solved ? "green" : "red"} paddingX={2} alignSelf="flex-start">
      {grid.map((row, y) => (
        <Box key={y}>
          {row.map((cell, x) =>
            cell.kind === "tile" ? (
              <Box
                key={x}
                width={TILE_WIDTH}
                height={TILE_HEIGHT}
                borderStyle="single"
                borderColor={cell.value % 2 === 0 ? "gray" : "blue"}
              >
                <Text>{formatTile(cell.value)}</Text>
              </Box>
            ) : (
              <Box key={x} width={TILE_WIDTH} height={TILE_HEIGHT} />
            ),
          )}
        </Box>
      ))}
    </Box>
  );
}

export default Board;
