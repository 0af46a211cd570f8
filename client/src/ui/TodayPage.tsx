import React from "react";
import { useNavigate } from "react-router-dom";
import { api, ApiError, setToken } from "../lib/api";
import type { HabitSnapshot, StoreIssue } from "../lib/api";
import { errorMessage, fmtDay, newestFirst, saveTextFile } from "../lib/utils";

function Warnings({ items }: { items: StoreIssue[] }) {
  if (!items.length) return null;
  return (
    <div className="panel warn" style={{ marginTop: 14 }}>
      {items.map((w, i) => (
        <div key={`${w.kind}-${i}`} className="small">
          <b>{w.kind}</b>: {w.message}
        </div>
      ))}
    </div>
  );
}

function TodayChecklist({
  snap,
  saving,
  onToggle,
}: {
  snap: HabitSnapshot;
  saving: boolean;
  onToggle: (habit: string, done: boolean) => void;
}) {
  const row = snap.todayRow;
  if (!row) {
    return <div className="danger">Could not find or create today's row. Please check the habits file.</div>;
  }
  if (!snap.table.habits.length) {
    return <div className="small">No habits added yet. Add some using the side panel!</div>;
  }

  return (
    <div className="checks">
      {snap.table.habits.map((h, i) => (
        <label key={h} className="check">
          <input type="checkbox" checked={row.done[i]} disabled={saving} onChange={(e) => onToggle(h, e.target.checked)} />
          <span>{h}</span>
        </label>
      ))}
    </div>
  );
}

function DataTable({ snap }: { snap: HabitSnapshot }) {
  return (
    <div className="tableWrap">
      <table className="data">
        <thead>
          <tr>
            {snap.columns.map((c) => (
              <th key={c}>{c}</th>
            ))}
          </tr>
        </thead>
        <tbody>
          {newestFirst(snap.table.rows).map((r, i) => (
            <tr key={`${r.date}-${i}`}>
              <td title={fmtDay(r.date)}>{r.date}</td>
              {r.done.map((d, j) => (
                <td key={j}>{d ? "✔" : ""}</td>
              ))}
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
}

export default function TodayPage() {
  const nav = useNavigate();

  const [snap, setSnap] = React.useState<HabitSnapshot | null>(null);
  const [newHabit, setNewHabit] = React.useState("");
  const [loading, setLoading] = React.useState(false);
  const [saving, setSaving] = React.useState(false);
  const [error, setError] = React.useState<string | null>(null);
  const [notice, setNotice] = React.useState<string | null>(null);

  function handleFailure(e: unknown, fallback: string) {
    if (e instanceof ApiError && e.status === 401) {
      setToken(null);
      nav("/login");
      return;
    }
    setError(errorMessage(e, fallback));
  }

  async function refresh() {
    setLoading(true);
    setError(null);
    try {
      setSnap(await api.habits());
    } catch (e: unknown) {
      handleFailure(e, "Failed to load habits.");
    } finally {
      setLoading(false);
    }
  }

  React.useEffect(() => {
    void refresh();
    // eslint-disable-next-line react-hooks/exhaustive-deps
  }, []);

  async function addHabit(e: React.FormEvent) {
    e.preventDefault();
    setSaving(true);
    setError(null);
    setNotice(null);
    try {
      const name = newHabit.trim();
      setSnap(await api.addHabit(name));
      setNewHabit("");
      setNotice(`Habit '${name}' added!`);
    } catch (e: unknown) {
      handleFailure(e, "Failed to add habit.");
    } finally {
      setSaving(false);
    }
  }

  async function toggle(habit: string, done: boolean) {
    setSaving(true);
    setError(null);
    try {
      setSnap(await api.setToday(habit, done));
    } catch (e: unknown) {
      handleFailure(e, "Failed to save.");
    } finally {
      setSaving(false);
    }
  }

  async function download() {
    try {
      const csv = await api.exportCsv();
      saveTextFile(csv, "habits.csv");
    } catch (e: unknown) {
      handleFailure(e, "Export failed.");
    }
  }

  return (
    <div className="container layout">
      <aside className="card body side">
        <h2>Manage Habits</h2>
        <form onSubmit={addHabit}>
          <div className="label">Add New Habit</div>
          <input className="input" value={newHabit} onChange={(e) => setNewHabit(e.target.value)} maxLength={80} />
          <button className="btn primary" style={{ marginTop: 8 }} disabled={saving}>
            Add Habit
          </button>
        </form>
        {notice ? <div className="ok small">{notice}</div> : null}
        <hr />
        <button className="btn" onClick={download} type="button">
          Download CSV
        </button>
      </aside>

      <main className="card body">
        <div className="hdr">
          <h1>Today's Habits ({snap?.today ?? "…"})</h1>
          <button className="btn" onClick={refresh} disabled={loading || saving}>
            Refresh
          </button>
        </div>

        {error ? <div className="danger">{error}</div> : null}
        {snap ? <Warnings items={snap.warnings} /> : null}

        <div style={{ marginTop: 14 }}>
          {snap ? <TodayChecklist snap={snap} saving={saving} onToggle={toggle} /> : <div className="small">Loading…</div>}
        </div>

        {snap ? (
          <>
            <h2 style={{ marginTop: 24 }}>All Habit Data</h2>
            <DataTable snap={snap} />
          </>
        ) : null}
      </main>
    </div>
  );
}
