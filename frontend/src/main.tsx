// frontend/src/main.tsx
import "./index.css";
import React from "react";
import ReactDOM from "react-dom/client";
import { createBrowserRouter, Navigate, RouterProvider } from "react-router-dom";

import App from "./App";
import DashboardPage from "./routes/DashboardPage";
import ExplorerPage from "./routes/ExplorerPage";
import ResultsPage from "./routes/ResultsPage";

const router = createBrowserRouter([
  {
    path: "/",
    element: <App />,
    children: [
      { index: true, element: <DashboardPage /> },
      { path: "explore", element: <ExplorerPage /> },
      { path: "results", element: <ResultsPage /> },
      { path: "*", element: <Navigate to="/" replace /> },
    ],
  },
]);

const rootEl = document.getElementById("root");
if (!rootEl) throw new Error("Fant ikke #root i index.html");

ReactDOM.createRoot(rootEl).render(
  <React.StrictMode>
    <RouterProvider router={router} />
  </React.StrictMode>
);
