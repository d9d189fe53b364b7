/**
 * Dashboard Session - serializes refreshes for one dashboard
 *
 * Starting a refresh aborts the one in flight. A refresh that completes after
 * a newer one has started is discarded, so the displayed snapshot always
 * belongs to the latest request.
 */

import { DashboardRequest, DashboardSnapshot } from '../types/dashboard';

export interface SnapshotSource {
  run(request: DashboardRequest, signal?: AbortSignal): Promise<DashboardSnapshot>;
}

export class DashboardSession {
  private generation = 0;
  private controller?: AbortController;
  private latest: DashboardSnapshot | null = null;

  constructor(private readonly pipeline: SnapshotSource) {}

  /**
   * Run a refresh
   *
   * @returns The new snapshot, or null when a newer refresh superseded this one
   */
  async refresh(request: DashboardRequest): Promise<DashboardSnapshot | null> {
    const generation = ++this.generation;
    this.controller?.abort();
    const controller = new AbortController();
    this.controller = controller;

    try {
      const snapshot = await this.pipeline.run(request, controller.signal);
      if (generation !== this.generation) {
        console.log(`[DashboardSession] Discarding stale refresh ${generation} for ${request.ticker}`);
        return null;
      }
      this.latest = snapshot;
      return snapshot;
    } catch (error) {
      if (generation !== this.generation) {
        console.log(`[DashboardSession] Discarding failed stale refresh ${generation} for ${request.ticker}`);
        return null;
      }
      throw error;
    } finally {
      if (this.controller === controller) {
        this.controller = undefined;
      }
    }
  }

  /**
   * Latest snapshot accepted by this session
   */
  current(): DashboardSnapshot | null {
    return this.latest;
  }

  /**
   * Abort the refresh in flight, if any
   */
  cancel(): void {
    this.generation++;
    this.controller?.abort();
    this.controller = undefined;
  }
}
