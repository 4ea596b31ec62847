export class Track {
  private readonly title: string;
  private readonly duration: number; // seconds

  constructor(title: string, duration: number) {
    if (!Number.isInteger(duration) || duration < 0) {
      throw new Error(`Track duration must be a non-negative integer, got ${duration}`);
    }
    this.title = title;
    this.duration = duration;
  }

  getTitle(): string {
    return this.title;
  }

  getDuration(): number {
    return this.duration;
  }

  isShorterThan(other: Track): boolean {
    return this.duration < other.duration;
  }

  /** Exact title comparison, ignoring case. */
  matchesTitle(title: string): boolean {
    return this.title.toLowerCase() === title.toLowerCase();
  }

  toString(): string {
    return `${this.title}, ${this.duration}`;
  }
}
