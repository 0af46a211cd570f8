export function errorMessage(e: unknown, fallback = "Failed") {
  if (e instanceof Error && e.message) return e.message;
  return fallback;
}

export function fmtDay(dayKey: string) {
  const [y, m, d] = dayKey.split("-").map(Number);
  const date = new Date(y, m - 1, d);
  if (Number.isNaN(date.getTime())) return dayKey;
  return date.toLocaleDateString(undefined, { weekday: "short", year: "numeric", month: "short", day: "2-digit" });
}

/** Snapshot rows, newest day first. */
export function newestFirst<T extends { date: string }>(rows: T[]) {
  return [...rows].sort((a, b) => (a.date < b.date ? 1 : a.date > b.date ? -1 : 0));
}

/** Hands text to the browser as a file download. */
export function saveTextFile(text: string, filename: string, type = "text/csv") {
  const url = URL.createObjectURL(new Blob([text], { type }));
  const a = document.createElement("a");
  a.href = url;
  a.download = filename;
  a.click();
  // revoking in the same tick can cancel the download in some browsers
  setTimeout(() => URL.revokeObjectURL(url), 0);
}
