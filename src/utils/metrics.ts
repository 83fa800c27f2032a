// Lightweight metrics collection system
interface Metrics {
  requests: number;
  errors: number;
  simulations: number;
  inventories: number;
  stored: number;
  discarded: number;
  unresolved: number;
}

const emptyMetrics = (): Metrics => ({
  requests: 0,
  errors: 0,
  simulations: 0,
  inventories: 0,
  stored: 0,
  discarded: 0,
  unresolved: 0,
});

class MetricsCollector {
  private metrics: Metrics = emptyMetrics();

  // Increment a specific metric
  increment(metric: keyof Metrics, count: number = 1): void {
    this.metrics[metric] += count;
  }

  // Get current metrics
  getMetrics(): Metrics {
    return { ...this.metrics };
  }

  // Reset all metrics (for testing)
  reset(): void {
    this.metrics = emptyMetrics();
  }
}

// Global metrics instance
export const metrics = new MetricsCollector();

// Helper functions for common metric increments
export const incrementRequests = () => metrics.increment('requests');
export const incrementErrors = () => metrics.increment('errors');
export const incrementSimulations = () => metrics.increment('simulations');
export const recordDecisions = (counts: { inventories: number; stored: number; discarded: number; unresolved: number }) => {
  metrics.increment('inventories', counts.inventories);
  metrics.increment('stored', counts.stored);
  metrics.increment('discarded', counts.discarded);
  metrics.increment('unresolved', counts.unresolved);
};
