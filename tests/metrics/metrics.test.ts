import { Metrics } from '../../src/metrics/metrics';

describe('Metrics', () => {
  let metrics: Metrics;

  beforeEach(() => {
    metrics = new Metrics();
  });

  it('should start with zeroed counters', () => {
    const snapshot = metrics.getSnapshot();
    expect(snapshot.tracksAdded).toBe(0);
    expect(snapshot.sorts).toBe(0);
    expect(snapshot.utilization).toBe(0);
    expect(snapshot.uptimeMs).toBeGreaterThanOrEqual(0);
  });

  it('should accumulate sorts and swaps', () => {
    metrics.recordSort(2);
    metrics.recordSort(3);

    const snapshot = metrics.getSnapshot();
    expect(snapshot.sorts).toBe(2);
    expect(snapshot.swaps).toBe(5);
  });

  it('should compute utilization from size and capacity', () => {
    metrics.updateCapacity(8);
    metrics.updateSize(2);
    expect(metrics.getSnapshot().utilization).toBe(25);
  });

  it('should reset counters but keep gauges', () => {
    metrics.incrementTracksAdded();
    metrics.incrementAddsRejected();
    metrics.updateCapacity(4);
    metrics.updateSize(1);

    metrics.reset();

    const snapshot = metrics.getSnapshot();
    expect(snapshot.tracksAdded).toBe(0);
    expect(snapshot.addsRejected).toBe(0);
    expect(snapshot.size).toBe(1);
    expect(snapshot.capacity).toBe(4);
  });

  describe('toPrometheusFormat', () => {
    it('should render counters and gauges', () => {
      metrics.incrementTracksAdded();
      metrics.incrementTracksAdded();
      metrics.recordSort(3);
      metrics.updateCapacity(5);
      metrics.updateSize(2);

      const lines = metrics.toPrometheusFormat().split('\n');
      expect(lines).toContain('tracks_added_total 2');
      expect(lines).toContain('swaps_total 3');
      expect(lines).toContain('track_list_size 2');
      expect(lines).toContain('track_list_capacity 5');
      expect(lines).toContain('# TYPE track_list_size gauge');
      expect(lines).toHaveLength(24);
    });
  });
});
