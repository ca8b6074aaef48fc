import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { log } from "../logger.js";
import { ShortTermStateSchema } from "../schemas.js";
import type { RawTurn, ShortTermStore } from "../types.js";

/**
 * Bounded FIFO of recent turns, persisted as JSON. Becomes "full" at
 * `capacity`; the updater then pops from the front until it is not.
 */
export class ShortTermMemory implements ShortTermStore {
  private turns: RawTurn[] = [];
  private loaded = false;

  constructor(
    private readonly filePath: string,
    private readonly capacity: number,
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`short-term capacity must be a positive integer, got ${capacity}`);
    }
  }

  async load(): Promise<void> {
    if (this.loaded) return;
    this.turns = await this.readState();
    this.loaded = true;
  }

  async save(): Promise<void> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, JSON.stringify({ turns: this.turns }, null, 2), "utf-8");
  }

  /** Appends a turn and reports whether the buffer is now full. */
  async addTurn(turn: RawTurn): Promise<boolean> {
    await this.load();
    this.turns.push({ ...turn });
    await this.save();
    const full = this.turns.length >= this.capacity;
    log.debug(`short-term: ${this.turns.length}/${this.capacity} turns${full ? " (full)" : ""}`);
    return full;
  }

  async isFull(): Promise<boolean> {
    await this.load();
    return this.turns.length >= this.capacity;
  }

  async popOldest(): Promise<RawTurn | null> {
    await this.load();
    const oldest = this.turns.shift();
    if (!oldest) return null;
    await this.save();
    return oldest;
  }

  getTurns(): RawTurn[] {
    return [...this.turns];
  }

  private async readState(): Promise<RawTurn[]> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf-8");
    } catch {
      return [];
    }
    try {
      const parsed = ShortTermStateSchema.safeParse(JSON.parse(raw));
      if (parsed.success) return parsed.data.turns;
      log.warn(`short-term state at ${this.filePath} has an unexpected shape; starting empty`);
    } catch (err) {
      log.warn(`short-term state at ${this.filePath} is not valid JSON; starting empty`, err);
    }
    return [];
  }
}
