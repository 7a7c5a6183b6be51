import { ScenarioError } from '../errors.js';

interface Rendezvous {
  parties: number;
  arrived: number;
  waiters: Array<{ resolve: () => void; reject: (error: Error) => void }>;
}

/**
 * Named rendezvous points for the concurrent steps of one scenario.
 *
 * A label is released when the expected number of parties has arrived, then
 * forgotten, so the same label can be used again later in the scenario.
 */
export class BarrierSet {
  private readonly points = new Map<string, Rendezvous>();
  private abortedWith: Error | null = null;

  arrive(label: string, parties = 2): Promise<void> {
    if (this.abortedWith) {
      return Promise.reject(this.abortedWith);
    }
    if (!Number.isInteger(parties) || parties < 1) {
      return Promise.reject(new ScenarioError(`barrier '${label}': parties must be a positive integer`));
    }

    let point = this.points.get(label);
    if (!point) {
      point = { parties, arrived: 0, waiters: [] };
      this.points.set(label, point);
    } else if (point.parties !== parties) {
      return Promise.reject(
        new ScenarioError(`barrier '${label}' expects ${point.parties} parties, called with ${parties}`)
      );
    }

    const current = point;
    const arrival = new Promise<void>((resolve, reject) => {
      current.waiters.push({ resolve, reject });
    });
    current.arrived++;
    if (current.arrived === current.parties) {
      this.points.delete(label);
      for (const waiter of current.waiters) waiter.resolve();
    }
    return arrival;
  }

  /**
   * Labels with parties still waiting, and how many have arrived.
   */
  pending(): Array<{ label: string; arrived: number; parties: number }> {
    return [...this.points.entries()].map(([label, point]) => ({
      label,
      arrived: point.arrived,
      parties: point.parties,
    }));
  }

  /**
   * Fail every waiting party and refuse new arrivals.
   */
  abort(error: Error): void {
    if (this.abortedWith) return;
    this.abortedWith = error;
    for (const point of this.points.values()) {
      for (const waiter of point.waiters) waiter.reject(error);
    }
    this.points.clear();
  }
}
