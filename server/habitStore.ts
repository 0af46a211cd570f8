import { promises as fs } from "node:fs";
import { dirname } from "node:path";
import type { HabitTable, StoreIssue } from "./types.js";
import { parseCsv, formatCsv } from "./csv.js";
import { decodeTable, emptyTable, encodeTable } from "./habitTable.js";

export type LoadResult = {
  table: HabitTable;
  issues: StoreIssue[];
  // false when the file holds content that could not be parsed and is kept for repair
  writable: boolean;
};

export type SaveResult = { ok: true } | { ok: false; issue: StoreIssue };

function errorMessage(err: unknown) {
  return err instanceof Error ? err.message : String(err);
}

function isMissingFile(err: unknown) {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * The habits CSV file. `load` and `save` never throw: problems come back as
 * StoreUnreadable / StoreUnwritable issues next to a usable table.
 */
export class HabitStore {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  get path() {
    return this.filePath;
  }

  async load(): Promise<LoadResult> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf-8");
    } catch (err: unknown) {
      if (isMissingFile(err)) return this.initialize([]);
      return this.unreadable(`Error loading habit data from ${this.filePath}: ${errorMessage(err)}`);
    }

    if (!raw.trim()) {
      return this.initialize([
        { kind: "StoreUnreadable", message: `${this.filePath} was empty; started a new table.` },
      ]);
    }

    try {
      return { table: decodeTable(parseCsv(raw)), issues: [], writable: true };
    } catch (err: unknown) {
      return this.unreadable(`Corrupt data file at ${this.filePath}: ${errorMessage(err)}`);
    }
  }

  async save(table: HabitTable): Promise<SaveResult> {
    const tmp = `${this.filePath}.tmp`;
    try {
      await fs.mkdir(dirname(this.filePath), { recursive: true });
      await fs.writeFile(tmp, formatCsv(encodeTable(table)), "utf-8");
      await fs.rename(tmp, this.filePath);
      return { ok: true };
    } catch (err: unknown) {
      return {
        ok: false,
        issue: {
          kind: "StoreUnwritable",
          message: `Error saving habit data to ${this.filePath}: ${errorMessage(err)}`,
        },
      };
    }
  }

  private async initialize(issues: StoreIssue[]): Promise<LoadResult> {
    const table = emptyTable();
    const saved = await this.save(table);
    return { table, issues: saved.ok ? issues : [...issues, saved.issue], writable: true };
  }

  private unreadable(message: string): LoadResult {
    return { table: emptyTable(), issues: [{ kind: "StoreUnreadable", message }], writable: false };
  }
}
