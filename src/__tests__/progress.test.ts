import { describe, it, expect, beforeAll } from "vitest";
import chalk from "chalk";
import { ProgressBoard, type ProgressOutput } from "../progress.js";

function capture(isTTY: boolean): ProgressOutput & { chunks: string[] } {
  const chunks: string[] = [];
  return {
    isTTY,
    chunks,
    write: (text: string) => chunks.push(text),
  };
}

describe("ProgressBoard", () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  it("writes one line per finished task when not on a terminal", () => {
    const out = capture(false);
    const board = new ProgressBoard(out);

    const a = board.task(0, "a.pdf");
    const b = board.task(1, "b.pdf");
    a.start(2);
    b.start(4);
    b.tick();
    a.tick();
    a.tick();
    a.finish(true);
    b.finish(false);

    expect(out.chunks).toEqual(["✓ 1) a.pdf [####################] 2/2\n", "✗ 2) b.pdf [#####---------------] 1/4\n"]);
  });

  it("redraws the block in place on a terminal", () => {
    const out = capture(true);
    const board = new ProgressBoard(out);

    const a = board.task(0, "a.pdf");
    a.start(2);
    a.tick();

    expect(out.chunks).toEqual([
      "\x1b[2K  1) a.pdf [--------------------] 0/2\n",
      "\x1b[1A\x1b[2K  1) a.pdf [##########----------] 1/2\n",
    ]);
  });

  it("shows an unknown total until the page count is known", () => {
    const out = capture(false);
    const board = new ProgressBoard(out);

    board.task(2, "c.pdf").finish(false);

    expect(out.chunks).toEqual(["✗ 3) c.pdf [--------------------] 0/?\n"]);
  });
});
