import { describe, it, expect } from "vitest";
import type { HabitTable } from "./types.js";
import {
  addHabit,
  coerceCell,
  columnsOf,
  decodeTable,
  emptyTable,
  encodeTable,
  ensureTodayRow,
  locateRow,
  toggle,
} from "./habitTable.js";

function sample(): HabitTable {
  return {
    habits: ["Gym", "Read"],
    rows: [
      { date: "2024-01-01", done: [true, false] },
      { date: "2024-01-02", done: [false, true] },
    ],
  };
}

describe("ensureTodayRow()", () => {
  it("adds a Date-only row to an empty table", () => {
    const t = ensureTodayRow(emptyTable(), "2024-01-01");
    expect(columnsOf(t)).toEqual(["Date"]);
    expect(t.rows).toEqual([{ date: "2024-01-01", done: [] }]);
  });

  it("appends a row with every habit unchecked", () => {
    const t = ensureTodayRow(sample(), "2024-01-03");
    expect(t.rows).toHaveLength(3);
    expect(t.rows[2]).toEqual({ date: "2024-01-03", done: [false, false] });
  });

  it("is idempotent", () => {
    const once = ensureTodayRow(sample(), "2024-01-03");
    const twice = ensureTodayRow(once, "2024-01-03");
    expect(twice).toBe(once);
    expect(twice).toEqual(once);
  });

  it("does not touch a table that already has the day", () => {
    const t = sample();
    expect(ensureTodayRow(t, "2024-01-02")).toBe(t);
  });
});

describe("addHabit()", () => {
  it("appends a column and backfills false", () => {
    const table: HabitTable = { habits: ["Gym"], rows: [{ date: "2024-01-01", done: [false] }] };
    const r = addHabit(table, "Read");
    expect(r.ok).toBe(true);
    if (!r.ok) return;

    expect(columnsOf(r.value)).toEqual(["Date", "Gym", "Read"]);
    expect(r.value.rows).toEqual([{ date: "2024-01-01", done: [false, false] }]);
  });

  it("leaves earlier rows' values in place", () => {
    const r = addHabit(sample(), "Exercise");
    if (!r.ok) throw new Error("expected ok");
    expect(r.value.rows.map((row) => row.done)).toEqual([
      [true, false, false],
      [false, true, false],
    ]);
  });

  it("trims the name", () => {
    const r = addHabit(emptyTable(), "  Walk  ");
    if (!r.ok) throw new Error("expected ok");
    expect(r.value.habits).toEqual(["Walk"]);
  });

  it("rejects an empty name without mutating", () => {
    const t = sample();
    const r = addHabit(t, "   ");
    expect(r).toEqual({
      ok: false,
      issue: { kind: "InvalidHabitName", reason: "empty", message: "Habit name cannot be empty." },
    });
    expect(t).toEqual(sample());
  });

  it("rejects a duplicate name", () => {
    const first = addHabit(sample(), "Exercise");
    if (!first.ok) throw new Error("expected ok");

    const again = addHabit(first.value, "Exercise");
    expect(again.ok).toBe(false);
    if (again.ok) return;
    expect(again.issue).toEqual({
      kind: "InvalidHabitName",
      reason: "duplicate",
      message: "Habit 'Exercise' already exists.",
    });
    expect(first.value.habits).toEqual(["Gym", "Read", "Exercise"]);
  });

  it("rejects the reserved Date column name", () => {
    const r = addHabit(sample(), "Date");
    expect(r.ok).toBe(false);
    if (r.ok) return;
    expect(r.issue.kind).toBe("InvalidHabitName");
  });
});

describe("toggle()", () => {
  it("sets exactly one cell", () => {
    const t = sample();
    const r = toggle(t, "2024-01-02", "Gym", true);
    if (!r.ok) throw new Error("expected ok");

    expect(r.value.rows).toEqual([
      { date: "2024-01-01", done: [true, false] },
      { date: "2024-01-02", done: [true, true] },
    ]);
    // input untouched
    expect(t).toEqual(sample());
  });

  it("can clear a cell", () => {
    const r = toggle(sample(), "2024-01-01", "Gym", false);
    if (!r.ok) throw new Error("expected ok");
    expect(r.value.rows[0].done).toEqual([false, false]);
  });

  it("reports a missing row", () => {
    expect(toggle(sample(), "2024-02-01", "Gym", true)).toEqual({
      ok: false,
      issue: { kind: "MissingTodayRow", date: "2024-02-01", message: "No row for 2024-02-01." },
    });
  });

  it("reports an unknown habit", () => {
    const r = toggle(sample(), "2024-01-01", "Swim", true);
    expect(r.ok).toBe(false);
    if (r.ok) return;
    expect(r.issue).toEqual({ kind: "UnknownHabit", habit: "Swim", message: "Habit 'Swim' does not exist." });
  });

  it("refuses to pick between duplicate dates", () => {
    const t: HabitTable = {
      habits: ["Gym"],
      rows: [
        { date: "2024-01-01", done: [false] },
        { date: "2024-01-01", done: [false] },
      ],
    };
    const r = toggle(t, "2024-01-01", "Gym", true);
    expect(r.ok).toBe(false);
    if (r.ok) return;
    expect(r.issue.kind).toBe("AmbiguousDateRow");
  });
});

describe("locateRow()", () => {
  it("returns the row index", () => {
    expect(locateRow(sample(), "2024-01-02")).toEqual({ ok: true, value: 1 });
  });
});

describe("coerceCell()", () => {
  it("reads truth literals", () => {
    expect(coerceCell("True")).toBe(true);
    expect(coerceCell("true")).toBe(true);
    expect(coerceCell(" TRUE ")).toBe(true);
    expect(coerceCell("1")).toBe(true);
  });

  it("reads everything else as false", () => {
    expect(coerceCell("False")).toBe(false);
    expect(coerceCell("")).toBe(false);
    expect(coerceCell(undefined)).toBe(false);
    expect(coerceCell("maybe")).toBe(false);
    expect(coerceCell("2")).toBe(false);
  });
});

describe("decodeTable()", () => {
  it("builds a typed table and pads short rows", () => {
    const t = decodeTable([
      ["Date", "Gym", "Read"],
      ["2024-1-1", "True", "yes please"],
      ["2024-01-02 00:00:00", "False"],
    ]);
    expect(t).toEqual({
      habits: ["Gym", "Read"],
      rows: [
        { date: "2024-01-01", done: [true, false] },
        { date: "2024-01-02", done: [false, false] },
      ],
    });
  });

  it("keeps duplicate dates as found", () => {
    const t = decodeTable([["Date"], ["2024-01-01"], ["2024-01-01"]]);
    expect(t.rows).toHaveLength(2);
  });

  it("rejects a header that does not start with Date", () => {
    expect(() => decodeTable([["Day", "Gym"]])).toThrow('first column must be "Date" (found "Day")');
  });

  it("rejects duplicate and empty column names", () => {
    expect(() => decodeTable([["Date", "Gym", "Gym"]])).toThrow('duplicate column "Gym"');
    expect(() => decodeTable([["Date", "Date"]])).toThrow('duplicate column "Date"');
    expect(() => decodeTable([["Date", ""]])).toThrow("header contains an empty column name");
  });

  it("rejects rows wider than the header", () => {
    expect(() => decodeTable([["Date", "Gym"], ["2024-01-01", "True", "True"]])).toThrow(
      "line 2 has 3 fields, expected at most 2",
    );
  });

  it("rejects bad dates", () => {
    expect(() => decodeTable([["Date"], ["2024-01-01"], ["not a day"]])).toThrow('line 3 has an invalid date "not a day"');
  });

  it("rejects an empty record list", () => {
    expect(() => decodeTable([])).toThrow("file has no header row");
  });
});

describe("encodeTable()", () => {
  it("writes booleans as True/False under the Date header", () => {
    expect(encodeTable(sample())).toEqual([
      ["Date", "Gym", "Read"],
      ["2024-01-01", "True", "False"],
      ["2024-01-02", "False", "True"],
    ]);
  });

  it("is the inverse of decodeTable", () => {
    expect(decodeTable(encodeTable(sample()))).toEqual(sample());
  });
});
