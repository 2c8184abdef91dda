import "./custom.scss";
import * as React from "react";
import * as ReactDOM from "react-dom/client";
import AnalyzerPage from "./pages/Analyzer.js";
import { ErrorBoundary } from "./components/ErrorBoundary.js";

const root = document.getElementById("root");
if (!root) {
  throw new Error("Missing #root element.");
}

ReactDOM.createRoot(root).render(
  <React.StrictMode>
    <ErrorBoundary>
      <AnalyzerPage />
    </ErrorBoundary>
  </React.StrictMode>,
);
