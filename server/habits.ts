import type { DayKey, HabitRow, HabitTable, StoreIssue } from "./types.js";
import type { HabitStore } from "./habitStore.js";
import { dayKeyOf } from "./dates.js";
import { formatCsv } from "./csv.js";
import { addHabit, encodeTable, ensureTodayRow, locateRow, toggle } from "./habitTable.js";

export type Clock = () => Date;

export type HabitSnapshot = {
  today: DayKey;
  table: HabitTable;
  todayRow: HabitRow | null;
  warnings: StoreIssue[];
};

export type MutationResult = { ok: true; snapshot: HabitSnapshot } | { ok: false; issue: StoreIssue; snapshot: HabitSnapshot };

type Cycle = {
  today: DayKey;
  table: HabitTable;
  warnings: StoreIssue[];
  writable: boolean;
};

/**
 * One interaction = load -> ensure today's row -> optional mutation -> save.
 * Nothing is kept between calls; the CSV file is the only state.
 */
export class HabitService {
  private readonly store: HabitStore;
  private readonly clock: Clock;

  constructor(store: HabitStore, clock: Clock = () => new Date()) {
    this.store = store;
    this.clock = clock;
  }

  async snapshot(): Promise<HabitSnapshot> {
    return this.finish(await this.begin());
  }

  async addHabit(name: string): Promise<MutationResult> {
    const cycle = await this.begin();

    const added = addHabit(cycle.table, name);
    if (!added.ok) return this.reject(cycle, added.issue);

    cycle.table = added.value;
    await this.persist(cycle);
    return { ok: true, snapshot: this.finish(cycle) };
  }

  async setToday(habit: string, done: boolean): Promise<MutationResult> {
    const cycle = await this.begin();

    const toggled = toggle(cycle.table, cycle.today, habit, done);
    if (!toggled.ok) return this.reject(cycle, toggled.issue);

    cycle.table = toggled.value;
    await this.persist(cycle);
    return { ok: true, snapshot: this.finish(cycle) };
  }

  async exportCsv() {
    const { table, issues } = await this.store.load();
    issues.forEach(warn);
    return formatCsv(encodeTable(table));
  }

  private async begin(): Promise<Cycle> {
    const today = dayKeyOf(this.clock());
    const { table, issues, writable } = await this.store.load();
    issues.forEach(warn);

    return {
      today,
      table: ensureTodayRow(table, today),
      warnings: [...issues],
      writable,
    };
  }

  private async persist(cycle: Cycle) {
    if (!cycle.writable) {
      this.note(cycle, {
        kind: "StoreUnwritable",
        message: `Not saving: ${this.store.path} could not be read and was left untouched.`,
      });
      return;
    }

    const saved = await this.store.save(cycle.table);
    if (!saved.ok) this.note(cycle, saved.issue);
  }

  private reject(cycle: Cycle, issue: StoreIssue): MutationResult {
    warn(issue);
    return { ok: false, issue, snapshot: this.finish(cycle) };
  }

  private note(cycle: Cycle, issue: StoreIssue) {
    warn(issue);
    cycle.warnings.push(issue);
  }

  private finish(cycle: Cycle): HabitSnapshot {
    const located = locateRow(cycle.table, cycle.today);
    if (!located.ok) this.note(cycle, located.issue);

    return {
      today: cycle.today,
      table: cycle.table,
      todayRow: located.ok ? cycle.table.rows[located.value] : null,
      warnings: cycle.warnings,
    };
  }
}

function warn(issue: StoreIssue) {
  console.warn(`⚠️ ${issue.kind}: ${issue.message}`);
}
