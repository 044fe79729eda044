import { logger } from '../logging/Logger';

export interface ComponentReadiness {
  component: string;
  ready: boolean;
  error?: string;
  since: string;
}

export interface ReadinessReport {
  overall: boolean;
  uptimeMs: number;
  pending: string[];
  components: ComponentReadiness[];
}

/**
 * Startup and runtime readiness of the server's moving parts (database,
 * oracle, HTTP listener, poller). Reported by the diagnostics endpoint.
 */
export class ReadinessTracker {
  private states = new Map<string, ComponentReadiness>();
  private readonly startedAt = Date.now();

  markReady(component: string): void {
    this.states.set(component, { component, ready: true, since: new Date().toISOString() });
    logger.info(`Component ready: ${component}`);
  }

  markNotReady(component: string, error?: string): void {
    this.states.set(component, { component, ready: false, error, since: new Date().toISOString() });
    logger.warn(`Component not ready: ${component}${error ? ` - ${error}` : ''}`);
  }

  isComponentReady(component: string): boolean {
    return this.states.get(component)?.ready ?? false;
  }

  /** False until at least one component has reported. */
  isAllReady(): boolean {
    const states = Array.from(this.states.values());
    return states.length > 0 && states.every(state => state.ready);
  }

  getReadinessStatus(): ReadinessReport {
    const components = Array.from(this.states.values());
    return {
      overall: this.isAllReady(),
      uptimeMs: Date.now() - this.startedAt,
      pending: components.filter(c => !c.ready).map(c => c.component),
      components
    };
  }
}

export const readinessTracker = new ReadinessTracker();
