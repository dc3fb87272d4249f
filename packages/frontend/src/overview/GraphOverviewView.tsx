import { RefreshCw } from "lucide-react";
import type { ServiceConnectionStatus } from "@supply-rag/shared";
import { useGraphOverview } from "../hooks/useGraphOverview";

const statusLabels: Record<ServiceConnectionStatus, string> = {
  ok: "Connected",
  failed: "Unreachable",
  not_configured: "Not configured"
};

export function GraphOverviewView() {
  const { stats, health, isLoading, error, reload } = useGraphOverview();

  return (
    <section className="page-shell">
      <header className="page-header">
        <p className="page-kicker">Supply Chain Graph</p>
        <h2 className="page-title">Overview</h2>
        <button
          type="button"
          className="icon-action-button"
          onClick={() => {
            void reload();
          }}
          disabled={isLoading}
          aria-label="Refresh overview"
        >
          <RefreshCw size={16} />
        </button>
      </header>

      {error ? <p className="error-banner">{error}</p> : null}

      {stats ? (
        <div className="overview-grid">
          <div className="panel">
            <h3>Nodes</h3>
            <dl className="stat-list">
              <dt>Products</dt>
              <dd>{stats.nodeCounts.Product}</dd>
              <dt>Suppliers</dt>
              <dd>{stats.nodeCounts.Supplier}</dd>
              <dt>Warehouses</dt>
              <dd>{stats.nodeCounts.Warehouse}</dd>
            </dl>
          </div>
          <div className="panel">
            <h3>Relationships</h3>
            <dl className="stat-list">
              <dt>SUPPLIES</dt>
              <dd>{stats.edgeCounts.SUPPLIES}</dd>
              <dt>STORED_AT</dt>
              <dd>{stats.edgeCounts.STORED_AT}</dd>
              <dt>CONNECTED_TO</dt>
              <dd>{stats.edgeCounts.CONNECTED_TO}</dd>
            </dl>
          </div>
        </div>
      ) : null}

      {health ? (
        <div className="panel">
          <h3>Services</h3>
          <dl className="stat-list">
            <dt>Neo4j</dt>
            <dd data-status={health.checks.neo4j}>{statusLabels[health.checks.neo4j]}</dd>
            <dt>Language model</dt>
            <dd data-status={health.checks.llm}>{statusLabels[health.checks.llm]}</dd>
          </dl>
        </div>
      ) : null}
    </section>
  );
}
