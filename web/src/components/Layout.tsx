import { Link, NavLink, Outlet } from "react-router-dom";

const NAV_ITEMS = [
  { to: "/predict", label: "Predict" },
  { to: "/heatmap", label: "Heatmap" },
  { to: "/players", label: "Players" },
  { to: "/compare", label: "Compare" },
  { to: "/", label: "About" },
];

export function Layout() {
  return (
    <div className="min-h-screen" style={{ fontFamily: "'Inter', Arial, sans-serif" }}>
      {/* Header bar */}
      <header
        style={{
          background: "linear-gradient(180deg, #1e293b 0%, #0f172a 100%)",
          borderBottom: "3px solid #ff6b2c",
          padding: "12px 24px",
          display: "flex",
          alignItems: "center",
          justifyContent: "space-between",
        }}
      >
        <Link to="/" style={{ textDecoration: "none", display: "flex", alignItems: "center", gap: 12 }}>
          {/* Basketball icon */}
          <svg width="36" height="36" viewBox="0 0 36 36" fill="none" aria-hidden="true">
            <circle cx="18" cy="18" r="16" stroke="#0f172a" strokeWidth="2" fill="#ff6b2c" />
            <path d="M2 18 C2 18, 18 10, 34 18" stroke="#0f172a" strokeWidth="1.5" fill="none" />
            <path d="M2 18 C2 18, 18 26, 34 18" stroke="#0f172a" strokeWidth="1.5" fill="none" />
            <line x1="18" y1="2" x2="18" y2="34" stroke="#0f172a" strokeWidth="1.5" />
          </svg>
          <span
            style={{
              fontSize: 26,
              fontWeight: 700,
              color: "#f8fafc",
              letterSpacing: 1,
              textTransform: "uppercase",
            }}
          >
            Shot Explorer
          </span>
        </Link>

        <nav style={{ display: "flex", alignItems: "center", gap: 8 }}>
          {NAV_ITEMS.map((item) => (
            <NavLink
              key={item.to}
              to={item.to}
              end
              style={({ isActive }) => ({
                color: isActive ? "#0f172a" : "#e2e8f0",
                fontSize: 14,
                textDecoration: "none",
                padding: "6px 16px",
                border: "1px solid #334155",
                borderRadius: 4,
                background: isActive ? "#ff6b2c" : "rgba(51, 65, 85, 0.5)",
              })}
            >
              {item.label}
            </NavLink>
          ))}
        </nav>
      </header>

      {/* Main content */}
      <main className="mx-auto max-w-6xl p-4">
        <Outlet />
      </main>
    </div>
  );
}
