import { Boxes, Menu, Moon, Sun } from "lucide-react";
import type { ThemeMode } from "../../stores/useAppStore";

interface TopBarProps {
  themeMode: ThemeMode;
  onThemeChange: (mode: ThemeMode) => void;
  onSidebarToggle: () => void;
}

export function TopBar({ themeMode, onThemeChange, onSidebarToggle }: TopBarProps) {
  return (
    <header className="topbar">
      <div className="brand-block">
        <button type="button" className="icon-button" aria-label="Toggle navigation" onClick={onSidebarToggle}>
          <Menu size={17} />
        </button>
        <div className="brand-dot">
          <Boxes size={18} strokeWidth={2.5} />
        </div>
        <h1 className="brand-title">Supply Chain RAG</h1>
      </div>

      <div className="topbar-actions">
        <div className="theme-switcher" role="group" aria-label="Theme mode">
          <button
            type="button"
            className={themeMode === "light" ? "is-active" : ""}
            onClick={() => onThemeChange("light")}
            aria-label="Light theme"
          >
            <Sun size={15} />
          </button>
          <button
            type="button"
            className={themeMode === "dark" ? "is-active" : ""}
            onClick={() => onThemeChange("dark")}
            aria-label="Dark theme"
          >
            <Moon size={15} />
          </button>
        </div>
      </div>
    </header>
  );
}
