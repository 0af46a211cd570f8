import { DATE_COLUMN } from "./types.js";
import type { DayKey, HabitRow, HabitTable, Outcome } from "./types.js";
import { normalizeDayKey } from "./dates.js";

const TRUE_CELLS = new Set(["true", "1"]);

export function emptyTable(): HabitTable {
  return { habits: [], rows: [] };
}

export function columnsOf(table: HabitTable) {
  return [DATE_COLUMN, ...table.habits];
}

/** Anything that is not a recognizable truth value reads as false. */
export function coerceCell(raw: string | undefined) {
  return TRUE_CELLS.has((raw ?? "").trim().toLowerCase());
}

function rowIndexesFor(table: HabitTable, date: DayKey) {
  const out: number[] = [];
  table.rows.forEach((r, i) => {
    if (r.date === date) out.push(i);
  });
  return out;
}

export function ensureTodayRow(table: HabitTable, today: DayKey): HabitTable {
  if (table.rows.some((r) => r.date === today)) return table;

  const row: HabitRow = { date: today, done: table.habits.map(() => false) };
  return { habits: table.habits, rows: [...table.rows, row] };
}

export function addHabit(table: HabitTable, rawName: string): Outcome<HabitTable> {
  const name = rawName.trim();

  if (!name) {
    return {
      ok: false,
      issue: { kind: "InvalidHabitName", reason: "empty", message: "Habit name cannot be empty." },
    };
  }
  if (name === DATE_COLUMN) {
    return {
      ok: false,
      issue: { kind: "InvalidHabitName", reason: "reserved", message: `"${DATE_COLUMN}" is reserved.` },
    };
  }
  if (table.habits.includes(name)) {
    return {
      ok: false,
      issue: { kind: "InvalidHabitName", reason: "duplicate", message: `Habit '${name}' already exists.` },
    };
  }

  return {
    ok: true,
    value: {
      habits: [...table.habits, name],
      rows: table.rows.map((r) => ({ date: r.date, done: [...r.done, false] })),
    },
  };
}

/** The single row for `date`, or the issue explaining why there isn't one. */
export function locateRow(table: HabitTable, date: DayKey): Outcome<number> {
  const hits = rowIndexesFor(table, date);
  if (hits.length === 0) {
    return {
      ok: false,
      issue: { kind: "MissingTodayRow", date, message: `No row for ${date}.` },
    };
  }
  if (hits.length > 1) {
    return {
      ok: false,
      issue: {
        kind: "AmbiguousDateRow",
        date,
        message: `${hits.length} rows share the date ${date}; fix the file by hand.`,
      },
    };
  }
  return { ok: true, value: hits[0] };
}

export function toggle(table: HabitTable, date: DayKey, habit: string, value: boolean): Outcome<HabitTable> {
  const col = table.habits.indexOf(habit);
  if (col < 0) {
    return {
      ok: false,
      issue: { kind: "UnknownHabit", habit, message: `Habit '${habit}' does not exist.` },
    };
  }

  const located = locateRow(table, date);
  if (!located.ok) return located;

  const at = located.value;
  return {
    ok: true,
    value: {
      habits: table.habits,
      rows: table.rows.map((r, i) => {
        if (i !== at) return r;
        const done = [...r.done];
        done[col] = value;
        return { date: r.date, done };
      }),
    },
  };
}

/** CSV records -> table. Throws with a readable reason when the file is malformed. */
export function decodeTable(records: string[][]): HabitTable {
  const [header, ...body] = records;
  if (!header) throw new Error("file has no header row");

  if (header[0] !== DATE_COLUMN) {
    throw new Error(`first column must be "${DATE_COLUMN}" (found "${header[0]}")`);
  }

  const seen = new Set<string>();
  for (const name of header) {
    if (!name.trim()) throw new Error("header contains an empty column name");
    if (seen.has(name)) throw new Error(`duplicate column "${name}"`);
    seen.add(name);
  }

  const habits = header.slice(1);
  const rows = body.map((rec, i) => {
    const line = i + 2;
    if (rec.length > header.length) {
      throw new Error(`line ${line} has ${rec.length} fields, expected at most ${header.length}`);
    }
    const date = normalizeDayKey(rec[0]);
    if (!date) throw new Error(`line ${line} has an invalid date "${rec[0]}"`);

    return { date, done: habits.map((_, j) => coerceCell(rec[j + 1])) };
  });

  return { habits, rows };
}

export function encodeTable(table: HabitTable): string[][] {
  return [
    columnsOf(table),
    ...table.rows.map((r) => [r.date, ...r.done.map((b) => (b ? "True" : "False"))]),
  ];
}
