import fs from "node:fs";
import path from "node:path";

/**
 * Line-delimited JSON log. Appends are synchronous so a write either lands
 * whole before the next event-loop turn or throws to the caller.
 */
export class Journal<E> {
  constructor(private readonly filePath: string) {}

  append(event: E): void {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    fs.appendFileSync(this.filePath, `${JSON.stringify(event)}\n`);
  }

  replay(apply: (event: E) => void): number {
    if (!fs.existsSync(this.filePath)) {
      return 0;
    }

    const lines = fs
      .readFileSync(this.filePath, "utf8")
      .split("\n")
      .filter(Boolean);
    for (const line of lines) {
      apply(JSON.parse(line) as E);
    }
    return lines.length;
  }
}
