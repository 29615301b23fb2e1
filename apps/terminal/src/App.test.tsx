import { describe, expect, it } from "vitest";
import { render } from "ink-testing-library";
import App from "./App";

const plain = (frame: string | undefined) => (frame ?? "").replace(/\u001b\[[0-9;]*m/g, "");

const tick = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

const waitForFrame = async (lastFrame: () => string | undefined, expected: string, timeoutMs = 1000) => {
  const deadline = Date.now() + timeoutMs;
  while (!plain(lastFrame()).includes(expected)) {
    if (Date.now() > deadline) throw new Error(`Frame never showed "${expected}":\n${plain(lastFrame())}`);
    await tick(10);
  }
  return plain(lastFrame());
};

describe("App", () => {
  it("shows the demo layout with its status", () => {
    const { lastFrame, unmount } = render(<App demo />);
    const frame = plain(lastFrame());
    expect(frame).toContain("Sliding Puzzle");
    expect(frame).toContain("Moves: 0 | Seed: demo");
    expect(frame).toContain("Demo layout loaded. Slide the tiles into order.");
    unmount();
  });

  it("applies key presses to the puzzle", async () => {
    const { lastFrame, stdin, unmount } = render(<App demo />);
    // useInput attaches its stdin listener in an effect, which runs after the first frame is drawn.
    await tick(50);
    stdin.write("a");
    const frame = await waitForFrame(lastFrame, "Moves: 1 | Seed: demo");
    expect(frame).toContain("Moves: 1 | Seed: demo");
    expect(frame).toContain("│ 05 ││ 06 │      │ 08 │");
    unmount();
  });
});
