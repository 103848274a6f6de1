import { NavLink, Outlet } from "react-router-dom";
import { currentYear } from "./lib/formatters";

const LINKS = [
  { to: "/", label: "Dashboard", end: true },
  { to: "/explore", label: "Explorer", end: false },
  { to: "/results", label: "Results", end: false },
];

export default function App() {
  return (
    <div className="min-h-screen flex flex-col">
      <header className="border-b bg-white">
        <div className="max-w-6xl mx-auto px-6 py-3 flex items-center justify-between">
          <div className="text-lg font-semibold">🚴 Team Ride Dashboard</div>
          <nav className="flex items-center gap-2 text-sm">
            {LINKS.map((l) => (
              <NavLink
                key={l.to}
                to={l.to}
                end={l.end}
                className={({ isActive }) =>
                  `px-3 py-1.5 rounded-2xl border ${isActive ? "shadow bg-black text-white" : ""}`
                }
              >
                {l.label}
              </NavLink>
            ))}
          </nav>
        </div>
      </header>

      <main className="max-w-6xl w-full mx-auto px-6 py-6 flex-1">
        <Outlet />
      </main>

      <footer className="border-t bg-white">
        <div className="max-w-6xl mx-auto px-6 py-4 text-sm text-slate-500">
          © {currentYear()} Team Ride Dashboard
        </div>
      </footer>
    </div>
  );
}
