/**
 * Bounded, newest-first gallery of recent generations for one session.
 */

export interface GalleryEntry {
  id: string;
  prompt: string;
  modelId: string;
  /** Provider that produced the image (e.g. "huggingface", "http") */
  provider: string;
  image: Buffer;
  mimeType: string;
  createdAt: Date;
}

export const DEFAULT_GALLERY_CAPACITY = 5;

export class GalleryStore {
  private entries: GalleryEntry[] = [];
  readonly capacity: number;

  constructor(capacity: number = DEFAULT_GALLERY_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Gallery capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  /** Insert at the head; anything past capacity is dropped immediately. */
  record(entry: GalleryEntry): void {
    this.entries.unshift(entry);
    if (this.entries.length > this.capacity) {
      this.entries.length = this.capacity;
    }
  }

  /** Newest first. Returns a copy; the store is never mutated by reads. */
  list(): GalleryEntry[] {
    return [...this.entries];
  }

  get(index: number): GalleryEntry | undefined {
    return this.entries[index];
  }

  get size(): number {
    return this.entries.length;
  }

  clear(): void {
    this.entries = [];
  }
}
