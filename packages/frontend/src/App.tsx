import { useEffect } from "react";
import { Navigate, Route, Routes } from "react-router-dom";
import { ChatView } from "./chat/ChatView";
import { MainContent } from "./components/layout/MainContent";
import { Sidebar } from "./components/layout/Sidebar";
import { TopBar } from "./components/layout/TopBar";
import { GraphOverviewView } from "./overview/GraphOverviewView";
import { useAppStore } from "./stores/useAppStore";

export function App() {
  const themeMode = useAppStore((state) => state.themeMode);
  const sidebarCollapsed = useAppStore((state) => state.sidebarCollapsed);
  const setThemeMode = useAppStore((state) => state.setThemeMode);
  const toggleSidebar = useAppStore((state) => state.toggleSidebar);

  useEffect(() => {
    if (themeMode === "system") {
      document.documentElement.removeAttribute("data-theme");
      return;
    }

    document.documentElement.setAttribute("data-theme", themeMode);
  }, [themeMode]);

  return (
    <div className="app-shell">
      <TopBar themeMode={themeMode} onThemeChange={setThemeMode} onSidebarToggle={toggleSidebar} />
      <div className="app-body">
        <Sidebar collapsed={sidebarCollapsed} />
        <MainContent>
          <Routes>
            <Route path="/" element={<Navigate to="/chat" replace />} />
            <Route path="/chat" element={<ChatView />} />
            <Route path="/overview" element={<GraphOverviewView />} />
            <Route path="*" element={<Navigate to="/chat" replace />} />
          </Routes>
        </MainContent>
      </div>
    </div>
  );
}
