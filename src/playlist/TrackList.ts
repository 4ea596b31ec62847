import { EventEmitter } from "node:events";
import { Track } from "../types/Track";
import { TrackListEventMap } from "../types/TrackListEvents";
import Metrics from "../metrics/metrics";

export interface TrackListOptions {
    metrics?: Metrics;
}

/**
 * An ordered list of tracks with a fixed maximum size.
 *
 * Slots are allocated once at construction. Out-of-range reads return
 * `undefined` and out-of-range or over-capacity writes are ignored, so no
 * method other than the constructor throws.
 */
export class TrackList extends EventEmitter {
    private tracks: Array<Track | undefined>;
    private maxSize: number;
    private size: number = 0;
    private metrics: Metrics;

    constructor(maxSize: number, options: TrackListOptions = {}) {
        super();
        if (!Number.isInteger(maxSize) || maxSize < 0) {
            throw new Error("Capacity must be a non-negative integer");
        }
        this.maxSize = maxSize;
        this.tracks = new Array<Track | undefined>(maxSize).fill(undefined);

        this.metrics = options.metrics ?? new Metrics();
        this.metrics.updateCapacity(maxSize);
        this.metrics.updateSize(0);
    }

    capacity(): number {
        return this.maxSize;
    }

    length(): number {
        return this.size;
    }

    get isEmpty(): boolean {
        return this.size === 0;
    }

    get isFull(): boolean {
        return this.size === this.maxSize;
    }

    get(index: number): Track | undefined {
        if (Number.isInteger(index) && index >= 0 && index < this.size) {
            return this.tracks[index];
        }
        return undefined;
    }

    append(track: Track): boolean {
        if (this.isFull) {
            this.reject(track, 'full');
            return false;
        }
        this.tracks[this.size] = track;
        this.size++;
        this.added(track, this.size - 1);
        return true;
    }

    /**
     * Inserts `track` at `index`, shifting later tracks right.
     * An index at or past the end appends.
     */
    insertAt(index: number, track: Track): boolean {
        if (!Number.isInteger(index) || index < 0) {
            this.reject(track, 'invalid-index');
            return false;
        }
        if (this.isFull) {
            this.reject(track, 'full');
            return false;
        }
        if (this.size === 0 || index >= this.size) {
            return this.append(track);
        }

        for (let i = this.size - 1; i >= index; i--) {
            this.tracks[i + 1] = this.tracks[i];
        }
        this.tracks[index] = track;
        this.size++;
        this.added(track, index);
        return true;
    }

    removeLast(): void {
        this.removeAt(this.size - 1);
    }

    removeAt(index: number): void {
        if (this.size === 0 || !Number.isInteger(index) || index < 0 || index >= this.size) return;

        const removed = this.tracks[index];
        for (let i = index; i < this.size - 1; i++) {
            this.tracks[i] = this.tracks[i + 1];
        }
        this.tracks[this.size - 1] = undefined;
        this.size--;

        this.metrics.incrementTracksRemoved();
        this.metrics.updateSize(this.size);
        if (removed) {
            this.emit('track:removed', { track: removed, index } satisfies TrackListEventMap['track:removed']);
        }
    }

    removeByTitle(title: string): void {
        // -1 falls through removeAt as a no-op
        this.removeAt(this.indexOfTitle(title));
    }

    removeFirst(): void {
        this.removeAt(0);
    }

    /** Appends every track of `other`, or nothing at all if they would not fit. */
    extend(other: TrackList): void {
        const incoming = other.toArray();

        if (this.size + incoming.length > this.maxSize) {
            this.metrics.incrementExtendsRejected();
            this.emit('list:extend-rejected', {
                requested: incoming.length,
                available: this.maxSize - this.size,
            } satisfies TrackListEventMap['list:extend-rejected']);
            return;
        }

        for (const track of incoming) {
            this.append(track);
        }
        this.emit('list:extended', { count: incoming.length } satisfies TrackListEventMap['list:extended']);
    }

    indexOfTitle(title: string): number {
        for (let i = 0; i < this.size; i++) {
            if (this.tracks[i]?.matchesTitle(title)) {
                return i;
            }
        }
        return -1;
    }

    /** Sum of all durations, in seconds. */
    totalDuration(): number {
        let total = 0;
        for (let i = 0; i < this.size; i++) {
            total += this.tracks[i]?.getDuration() ?? 0;
        }
        return total;
    }

    shortestTrackTitle(): string | undefined {
        return this.get(this.minIndexFrom(0))?.getTitle();
    }

    /**
     * Index of the shortest track in `[start, size)`, or -1 when `start` is
     * not an index of the list. The first of several equally short tracks wins.
     */
    minIndexFrom(start: number): number {
        if (!Number.isInteger(start) || start < 0 || start > this.size - 1) {
            return -1;
        }

        let shortestIndex = start;
        for (let i = start + 1; i < this.size; i++) {
            const candidate = this.tracks[i];
            const shortest = this.tracks[shortestIndex];
            if (candidate && shortest && candidate.isShorterThan(shortest)) {
                shortestIndex = i;
            }
        }
        return shortestIndex;
    }

    /**
     * Selection sort by ascending duration. Equal durations are not kept in
     * their original order.
     */
    sortInPlace(): void {
        let swaps = 0;
        for (let i = 0; i < this.size; i++) {
            const min = this.minIndexFrom(i);
            if (min !== i) {
                const temp = this.tracks[i];
                this.tracks[i] = this.tracks[min];
                this.tracks[min] = temp;
                swaps++;
            }
        }
        this.metrics.recordSort(swaps);
        this.emit('list:sorted', { swaps } satisfies TrackListEventMap['list:sorted']);
    }

    toArray(): Track[] {
        const result: Track[] = [];
        for (const track of this) {
            result.push(track);
        }
        return result;
    }

    getMetrics(): Metrics {
        return this.metrics;
    }

    *[Symbol.iterator](): IterableIterator<Track> {
        for (let i = 0; i < this.size; i++) {
            const track = this.tracks[i];
            if (track) yield track;
        }
    }

    toString(): string {
        let str = "";
        for (const track of this) {
            str += "\n" + track.toString();
        }
        return str;
    }

    private added(track: Track, index: number): void {
        this.metrics.incrementTracksAdded();
        this.metrics.updateSize(this.size);
        this.emit('track:added', { track, index } satisfies TrackListEventMap['track:added']);
        if (this.isFull) {
            this.emit('list:full');
        }
    }

    private reject(track: Track, reason: TrackListEventMap['track:rejected']['reason']): void {
        this.metrics.incrementAddsRejected();
        this.emit('track:rejected', { track, reason } satisfies TrackListEventMap['track:rejected']);
    }
}
