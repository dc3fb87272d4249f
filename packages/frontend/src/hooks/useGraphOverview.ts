import { useCallback, useEffect, useState } from "react";
import type { GraphStats, HealthResponse } from "@supply-rag/shared";
import { apiClient } from "../services/api";

interface GraphOverviewState {
  stats: GraphStats | null;
  health: HealthResponse | null;
  isLoading: boolean;
  error: string | null;
  reload: () => Promise<void>;
}

export function useGraphOverview(): GraphOverviewState {
  const [stats, setStats] = useState<GraphStats | null>(null);
  const [health, setHealth] = useState<HealthResponse | null>(null);
  const [isLoading, setIsLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);

  const load = useCallback(async (signal?: AbortSignal) => {
    setIsLoading(true);
    setError(null);

    // Health is reported even when the graph store is down.
    const [overviewResult, healthResult] = await Promise.allSettled([
      apiClient.graph.getOverview(signal),
      apiClient.health.get(signal)
    ]);
    if (signal?.aborted) {
      return;
    }

    if (overviewResult.status === "fulfilled") {
      setStats(overviewResult.value.stats);
    } else {
      setStats(null);
      const reason: unknown = overviewResult.reason;
      setError(reason instanceof Error ? reason.message : "Failed to load graph overview");
    }
    setHealth(healthResult.status === "fulfilled" ? healthResult.value : null);
    setIsLoading(false);
  }, []);

  useEffect(() => {
    const controller = new AbortController();
    void load(controller.signal);
    return () => controller.abort();
  }, [load]);

  const reload = useCallback(() => load(), [load]);

  return { stats, health, isLoading, error, reload };
}
