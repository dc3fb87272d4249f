import type { PropsWithChildren } from "react";
import { useLocation } from "react-router-dom";

export function MainContent({ children }: PropsWithChildren) {
  const location = useLocation();

  return (
    <main className="main-content">
      <section key={location.pathname} className="main-surface">
        {children}
      </section>
    </main>
  );
}
