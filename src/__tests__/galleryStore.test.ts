import { describe, it, expect } from "vitest";
import { GalleryStore, type GalleryEntry } from "../services/gallery/galleryStore";

function entry(n: number): GalleryEntry {
  return {
    id: `entry-${n}`,
    prompt: `prompt ${n}`,
    modelId: "stabilityai/stable-diffusion-2",
    provider: "mock",
    image: Buffer.from(`image ${n}`),
    mimeType: "image/png",
    createdAt: new Date(Date.UTC(2026, 9, 19, 12, n)),
  };
}

describe("GalleryStore", () => {
  it("defaults to a capacity of 5", () => {
    expect(new GalleryStore().capacity).toBe(5);
  });

  it("rejects a capacity below one", () => {
    expect(() => new GalleryStore(0)).toThrow(/positive integer/);
    expect(() => new GalleryStore(2.5)).toThrow(/positive integer/);
  });

  it("lists newest first", () => {
    const store = new GalleryStore(5);
    store.record(entry(1));
    store.record(entry(2));
    store.record(entry(3));

    expect(store.list().map((e) => e.id)).toEqual(["entry-3", "entry-2", "entry-1"]);
  });

  it("keeps the 5 most recent of 6 inserts, dropping the oldest", () => {
    const store = new GalleryStore(5);
    for (let n = 1; n <= 6; n++) {
      store.record(entry(n));
    }

    expect(store.size).toBe(5);
    expect(store.list().map((e) => e.id)).toEqual([
      "entry-6",
      "entry-5",
      "entry-4",
      "entry-3",
      "entry-2",
    ]);
  });

  it("never exceeds capacity after any number of inserts", () => {
    const store = new GalleryStore(3);
    for (let n = 1; n <= 10; n++) {
      store.record(entry(n));
      expect(store.size).toBeLessThanOrEqual(3);
    }
    expect(store.list().map((e) => e.id)).toEqual(["entry-10", "entry-9", "entry-8"]);
  });

  it("list() does not expose the internal array", () => {
    const store = new GalleryStore(5);
    store.record(entry(1));

    const listed = store.list();
    listed.pop();

    expect(store.size).toBe(1);
  });

  it("get() indexes newest first and returns undefined out of range", () => {
    const store = new GalleryStore(5);
    store.record(entry(1));
    store.record(entry(2));

    expect(store.get(0)?.id).toBe("entry-2");
    expect(store.get(1)?.id).toBe("entry-1");
    expect(store.get(2)).toBeUndefined();
  });

  it("clear() empties the store", () => {
    const store = new GalleryStore(5);
    store.record(entry(1));
    store.clear();

    expect(store.size).toBe(0);
    expect(store.list()).toEqual([]);
  });
});
