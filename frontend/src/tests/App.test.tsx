// frontend/src/tests/App.test.tsx
import "@testing-library/jest-dom/vitest";
import { render, screen } from "@testing-library/react";
import { MemoryRouter, Route, Routes } from "react-router-dom";
import { describe, expect, it } from "vitest";
import App from "../App";

function renderAt(path: string) {
  render(
    <MemoryRouter initialEntries={[path]}>
      <Routes>
        <Route path="/" element={<App />}>
          <Route index element={<div>Forside</div>} />
          <Route path="results" element={<div>Resultatside</div>} />
        </Route>
      </Routes>
    </MemoryRouter>
  );
}

describe("App", () => {
  it("viser navigasjon, innhold og footer med år", () => {
    renderAt("/");

    expect(screen.getByText("Forside")).toBeInTheDocument();
    expect(screen.getByRole("link", { name: "Dashboard" })).toHaveClass("bg-black");
    expect(screen.getByRole("link", { name: "Explorer" })).toHaveAttribute("href", "/explore");
    expect(screen.getByText(`© ${new Date().getFullYear()} Team Ride Dashboard`)).toBeInTheDocument();
  });

  it("markerer aktiv lenke", () => {
    renderAt("/results");

    expect(screen.getByText("Resultatside")).toBeInTheDocument();
    expect(screen.getByRole("link", { name: "Results" })).toHaveClass("bg-black");
    expect(screen.getByRole("link", { name: "Dashboard" })).not.toHaveClass("bg-black");
  });
});
