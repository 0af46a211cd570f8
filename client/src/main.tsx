import React from "react";
import ReactDOM from "react-dom/client";
import { BrowserRouter } from "react-router-dom";
import App from "./ui/App";
import "./ui/styles.css";

/**
 * A render crash or rejected promise otherwise leaves a blank page;
 * this overlay makes the real error visible.
 */
function showCrash(details: string) {
  const id = "crash-overlay";
  let el = document.getElementById(id);
  if (!el) {
    el = document.createElement("div");
    el.id = id;
    el.className = "crash";
    document.body.appendChild(el);
  }
  const title = document.createElement("div");
  title.className = "crashTitle";
  title.textContent = "App crashed (runtime)";
  const pre = document.createElement("pre");
  pre.textContent = details;
  el.replaceChildren(title, pre);
}

function describe(err: unknown) {
  if (err instanceof Error) return String(err.stack || err.message);
  return String(err);
}

class ErrorBoundary extends React.Component<{ children: React.ReactNode }, { err?: string }> {
  constructor(props: { children: React.ReactNode }) {
    super(props);
    this.state = {};
  }
  static getDerivedStateFromError(err: unknown) {
    return { err: describe(err) };
  }
  componentDidCatch(err: unknown) {
    showCrash(describe(err));
  }
  render() {
    if (this.state.err) {
      return (
        <div className="container">
          <div className="card body">
            <div className="danger">App crashed</div>
            <pre style={{ whiteSpace: "pre-wrap" }}>{this.state.err}</pre>
          </div>
        </div>
      );
    }
    return this.props.children;
  }
}

window.addEventListener("error", (e) => showCrash(describe(e.error ?? e.message)));
window.addEventListener("unhandledrejection", (e) => showCrash(describe(e.reason)));

const root = document.getElementById("root");
if (!root) throw new Error("#root element missing from index.html");

ReactDOM.createRoot(root).render(
  <React.StrictMode>
    <ErrorBoundary>
      <BrowserRouter>
        <App />
      </BrowserRouter>
    </ErrorBoundary>
  </React.StrictMode>,
);
