import { BarChart3, MessageSquare, type LucideIcon } from "lucide-react";
import { NavLink } from "react-router-dom";

interface NavigationItem {
  to: string;
  label: string;
  icon: LucideIcon;
}

interface SidebarProps {
  collapsed?: boolean;
}

const navItems: NavigationItem[] = [
  { to: "/chat", label: "Assistant", icon: MessageSquare },
  { to: "/overview", label: "Graph Overview", icon: BarChart3 }
];

export function Sidebar({ collapsed = false }: SidebarProps) {
  return (
    <aside className={collapsed ? "sidebar is-collapsed" : "sidebar"}>
      <nav className="sidebar-nav" aria-label="Primary">
        {navItems.map((item) => {
          const Icon = item.icon;
          return (
            <NavLink
              key={item.to}
              to={item.to}
              className={({ isActive }) => (isActive ? "sidebar-link is-active" : "sidebar-link")}
              aria-label={item.label}
              title={item.label}
            >
              <Icon size={20} strokeWidth={2} />
              {collapsed ? null : <span className="sidebar-link-label">{item.label}</span>}
            </NavLink>
          );
        })}
      </nav>
    </aside>
  );
}
