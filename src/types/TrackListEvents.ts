import { Track } from "./Track";

export type RejectReason = 'full' | 'invalid-index';

interface TrackLifeCycleEvents {
  'track:added': { track: Track; index: number };
  'track:rejected': { track: Track; reason: RejectReason };
  'track:removed': { track: Track; index: number };
}

interface ListStateEvents {
  'list:full': void;
  'list:extended': { count: number };
  'list:extend-rejected': { requested: number; available: number };
  'list:sorted': { swaps: number };
}

export type TrackListEventMap = TrackLifeCycleEvents & ListStateEvents;
