import React from "react";
import { useNavigate } from "react-router-dom";
import { api } from "../lib/api";
import { errorMessage } from "../lib/utils";

export default function AuthPage() {
  const nav = useNavigate();
  const [password, setPassword] = React.useState("");
  const [err, setErr] = React.useState<string | null>(null);
  const [loading, setLoading] = React.useState(false);

  async function submit(e: React.FormEvent) {
    e.preventDefault();
    setErr(null);
    setLoading(true);
    try {
      await api.login(password);
      setPassword("");
      nav("/today");
    } catch (e: unknown) {
      setErr(errorMessage(e));
    } finally {
      setLoading(false);
    }
  }

  return (
    <div className="container">
      <div className="card">
        <div className="hdr">
          <div>
            <h1>Welcome back</h1>
            <div className="sub">Enter the tracker password to continue.</div>
          </div>
          <span className="badge">Private</span>
        </div>

        <div className="body">
          <form onSubmit={submit} className="row" style={{ alignItems: "flex-end" }}>
            <div className="col">
              <div className="label">Password</div>
              <input
                className="input"
                value={password}
                onChange={(e) => setPassword(e.target.value)}
                type="password"
                autoFocus
              />
            </div>

            <div className="col" style={{ flexBasis: 180 }}>
              <button className="btn primary" disabled={loading || !password}>
                {loading ? "Checking..." : "Login"}
              </button>
            </div>
          </form>

          {err && (
            <div style={{ marginTop: 12 }} className="card body">
              <div className="danger">😕 {err}</div>
            </div>
          )}
        </div>
      </div>
    </div>
  );
}
