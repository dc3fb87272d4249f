import { cleanup, render, screen } from "@testing-library/react";
import { MemoryRouter } from "react-router-dom";
import { afterEach, describe, expect, it } from "vitest";
import { Sidebar } from "../../../src/components/layout/Sidebar";

afterEach(cleanup);

function renderAt(path: string, collapsed = false) {
  render(
    <MemoryRouter initialEntries={[path]}>
      <Sidebar collapsed={collapsed} />
    </MemoryRouter>
  );
}

describe("Sidebar", () => {
  it("renders an icon link for each page and marks the active one", () => {
    renderAt("/overview");

    const overview = screen.getByRole("link", { name: "Graph Overview" });
    const assistant = screen.getByRole("link", { name: "Assistant" });

    expect(overview.getAttribute("href")).toBe("/overview");
    expect(overview.className).toBe("sidebar-link is-active");
    expect(assistant.className).toBe("sidebar-link");
    expect(overview.querySelector("svg")).not.toBeNull();
  });

  it("hides the text labels when collapsed", () => {
    renderAt("/chat", true);

    expect(screen.getByRole("link", { name: "Assistant" }).textContent).toBe("");
  });
});
