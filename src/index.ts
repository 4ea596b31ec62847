// Core
export { TrackList } from "./playlist/TrackList";
export type { TrackListOptions } from "./playlist/TrackList";

// Types
export { Track } from "./types/Track";
export type { TrackListEventMap, RejectReason } from "./types/TrackListEvents";

// Metrics
export { Metrics } from "./metrics/metrics";
export type { MetricsSnapshot } from "./metrics/metrics";
