import fs from "node:fs";
import path from "node:path";
import type { Phase, WorkItem } from "./types";

export class StateStore {
  constructor(private readonly rootDir: string) {}

  ensure(): void {
    fs.mkdirSync(this.rootDir, { recursive: true });
    fs.mkdirSync(path.join(this.rootDir, "state"), { recursive: true });
  }

  journalPath(name: "catalogue" | "chronicle"): string {
    return path.join(this.rootDir, `${name}.jsonl`);
  }

  private snapshotPath(name: "phases" | "items"): string {
    return path.join(this.rootDir, "state", `${name}.json`);
  }

  savePhases(phases: Phase[]): void {
    this.write(this.snapshotPath("phases"), phases);
  }

  loadPhases(): Phase[] | null {
    return this.read<Phase[]>(this.snapshotPath("phases"));
  }

  saveItems(items: WorkItem[]): void {
    this.write(this.snapshotPath("items"), items);
  }

  loadItems(): WorkItem[] {
    return (this.read<WorkItem[]>(this.snapshotPath("items")) ?? []).sort(
      (a, b) => a.id.localeCompare(b.id),
    );
  }

  private write(file: string, value: unknown): void {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    // readers see the previous snapshot or the new one, never a partial file
    const temp = `${file}.tmp`;
    fs.writeFileSync(temp, JSON.stringify(value, null, 2));
    fs.renameSync(temp, file);
  }

  private read<T>(file: string): T | null {
    if (!fs.existsSync(file)) {
      return null;
    }

    return JSON.parse(fs.readFileSync(file, "utf8")) as T;
  }
}
