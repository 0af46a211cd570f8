import React from "react";
import { Routes, Route, Navigate, useNavigate } from "react-router-dom";
import { getToken, setToken } from "../lib/api";
import AuthPage from "./AuthPage";
import TodayPage from "./TodayPage";

function Topbar() {
  const nav = useNavigate();
  const token = getToken();
  return (
    <div className="container">
      <div className="card hdr">
        <div>
          <h1>✅ Habit Tracker</h1>
          <div className="sub">One row a day. One box per habit.</div>
        </div>
        {token ? (
          <button
            className="btn"
            onClick={() => {
              setToken(null);
              nav("/login");
            }}
          >
            Log out
          </button>
        ) : (
          <span className="badge">Locked</span>
        )}
      </div>
    </div>
  );
}

function RequireAuth({ children }: { children: React.ReactNode }) {
  const token = getToken();
  if (!token) return <Navigate to="/login" replace />;
  return <>{children}</>;
}

export default function App() {
  return (
    <>
      <Topbar />
      <Routes>
        <Route path="/login" element={<AuthPage />} />
        <Route
          path="/today"
          element={
            <RequireAuth>
              <TodayPage />
            </RequireAuth>
          }
        />
        <Route path="*" element={<Navigate to="/today" replace />} />
      </Routes>
    </>
  );
}
