export interface MetricsSnapshot {
  tracksAdded: number;
  addsRejected: number;
  tracksRemoved: number;
  extendsRejected: number;
  sorts: number;
  swaps: number;

  size: number;
  capacity: number;

  utilization: number; // percentage

  uptimeMs: number;
}

export class Metrics {
  private tracksAdded: number = 0
  private addsRejected: number = 0
  private tracksRemoved: number = 0
  private extendsRejected: number = 0
  private sorts: number = 0
  private swaps: number = 0

  private size: number = 0
  private capacity: number = 0

  private readonly startTime: number = Date.now();

  incrementTracksAdded(): void {
    this.tracksAdded++
  }

  incrementAddsRejected(): void {
    this.addsRejected++
  }

  incrementTracksRemoved(): void {
    this.tracksRemoved++
  }

  incrementExtendsRejected(): void {
    this.extendsRejected++
  }

  recordSort(swaps: number): void {
    this.sorts++
    this.swaps += swaps
  }

  updateSize(size: number): void {
    this.size = size
  }

  updateCapacity(capacity: number): void {
    this.capacity = capacity
  }

  getSnapshot(): MetricsSnapshot {
    return {
      tracksAdded: this.tracksAdded,
      addsRejected: this.addsRejected,
      tracksRemoved: this.tracksRemoved,
      extendsRejected: this.extendsRejected,
      sorts: this.sorts,
      swaps: this.swaps,

      size: this.size,
      capacity: this.capacity,

      utilization: this.capacity > 0 ? (this.size / this.capacity) * 100 : 0,

      uptimeMs: Date.now() - this.startTime
    }
  }

  // Counters only; size and capacity are left as they are.
  reset(): void {
    this.tracksAdded = 0
    this.addsRejected = 0
    this.tracksRemoved = 0
    this.extendsRejected = 0
    this.sorts = 0
    this.swaps = 0
  }

  toPrometheusFormat(): string {
    const snapshot = this.getSnapshot();
    return [
      '# HELP tracks_added_total Total tracks added to the list',
      '# TYPE tracks_added_total counter',
      `tracks_added_total ${snapshot.tracksAdded}`,
      '# HELP adds_rejected_total Total adds refused by the list',
      '# TYPE adds_rejected_total counter',
      `adds_rejected_total ${snapshot.addsRejected}`,
      '# HELP tracks_removed_total Total tracks removed from the list',
      '# TYPE tracks_removed_total counter',
      `tracks_removed_total ${snapshot.tracksRemoved}`,
      '# HELP extends_rejected_total Total extends aborted on capacity',
      '# TYPE extends_rejected_total counter',
      `extends_rejected_total ${snapshot.extendsRejected}`,
      '# HELP sorts_total Total in-place sorts',
      '# TYPE sorts_total counter',
      `sorts_total ${snapshot.sorts}`,
      '# HELP swaps_total Total swaps made by in-place sorts',
      '# TYPE swaps_total counter',
      `swaps_total ${snapshot.swaps}`,
      '# HELP track_list_size Current number of tracks',
      '# TYPE track_list_size gauge',
      `track_list_size ${snapshot.size}`,
      '# HELP track_list_capacity Maximum number of tracks',
      '# TYPE track_list_capacity gauge',
      `track_list_capacity ${snapshot.capacity}`,
    ].join('\n');
  }
}

export default Metrics;
