import chalk from "chalk";

/** Per-task progress handle handed to one engine run. */
export interface TaskProgress {
  start(total: number): void;
  tick(): void;
  finish(ok: boolean): void;
}

export interface ProgressOutput {
  isTTY?: boolean;
  write(text: string): unknown;
}

export interface ProgressRow {
  label: string;
  done: number;
  total: number;
  state: "pending" | "running" | "ok" | "failed";
}

const BAR_WIDTH = 20;

/**
 * One line per task. On a terminal the whole block is redrawn in place;
 * otherwise only a line per finished task is written.
 */
export class ProgressBoard {
  private readonly rows = new Map<number, ProgressRow>();
  private drawn = 0;

  constructor(private readonly out: ProgressOutput = process.stdout) {}

  get interactive(): boolean {
    return this.out.isTTY === true;
  }

  task(id: number, label: string): TaskProgress {
    const row: ProgressRow = { label: `${id + 1}) ${label}`, done: 0, total: 0, state: "pending" };
    this.rows.set(id, row);

    return {
      start: (total) => {
        row.total = total;
        row.state = "running";
        this.redraw();
      },
      tick: () => {
        row.done = row.total > 0 ? Math.min(row.done + 1, row.total) : row.done + 1;
        this.redraw();
      },
      finish: (ok) => {
        row.state = ok ? "ok" : "failed";
        if (ok && row.total > 0) row.done = row.total;
        if (this.interactive) {
          this.redraw();
        } else {
          this.out.write(`${formatRow(row)}\n`);
        }
      },
    };
  }

  private redraw(): void {
    if (!this.interactive) return;
    let text = this.drawn > 0 ? `\x1b[${this.drawn}A` : "";
    let lines = 0;
    const ids = [...this.rows.keys()].sort((a, b) => a - b);
    for (const id of ids) {
      const row = this.rows.get(id);
      if (!row) continue;
      text += `\x1b[2K${formatRow(row)}\n`;
      lines++;
    }
    this.out.write(text);
    this.drawn = lines;
  }
}

export function formatRow(row: ProgressRow): string {
  const filled = row.total > 0 ? Math.round((row.done / row.total) * BAR_WIDTH) : 0;
  const bar = "#".repeat(filled) + "-".repeat(BAR_WIDTH - filled);
  const counts = `${row.done}/${row.total || "?"}`;

  switch (row.state) {
    case "ok":
      return `${chalk.green("✓")} ${row.label} [${chalk.green(bar)}] ${counts}`;
    case "failed":
      return `${chalk.red("✗")} ${row.label} [${bar}] ${counts}`;
    default:
      return `  ${row.label} [${bar}] ${counts}`;
  }
}

export const noProgress: TaskProgress = {
  start: () => {},
  tick: () => {},
  finish: () => {},
};
