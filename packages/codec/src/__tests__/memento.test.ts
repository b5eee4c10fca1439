import { describe, it, expect } from "vitest";
import { MalformedStreamError, NotSeekableError } from "@treecodec/core";
import { ByteBuffer, type ByteSink, type ByteSource } from "../byte-buffer.js";
import { Memento } from "../memento.js";
import { snapshot, toBytes } from "../operations.js";
import { render } from "../text-renderer.js";
import { Playlist, PlaylistWithCurator, samplePlaylist, SAMPLE_PLAYLIST_TEXT } from "./fixtures.js";

/** Forward-only medium: reads drain what was written, no seeking. */
class Pipe implements ByteSink, ByteSource {
  private readonly bytes: number[] = [];
  position = 0;

  write(chunk: Uint8Array): void {
    this.bytes.push(...chunk);
  }

  read(length: number): Uint8Array {
    const out = Uint8Array.from(this.bytes.slice(this.position, this.position + length));
    this.position += out.length;
    return out;
  }
}

describe("Memento", () => {
  it("restores the captured value any number of times", () => {
    const memento = snapshot(samplePlaylist());

    memento.reset();
    const first = memento.restore(new Playlist());
    memento.reset();
    const second = memento.restore(new Playlist());

    expect(first).not.toBe(second);
    expect(render(first)).toBe(SAMPLE_PLAYLIST_TEXT);
    expect(render(second)).toBe(SAMPLE_PLAYLIST_TEXT);
  });

  it("is detached from later changes to the source", () => {
    const source = samplePlaylist();
    const memento = snapshot(source);
    source.name = "changed";
    source.tracks = [];

    memento.reset();
    expect(render(memento.restore(new Playlist()))).toBe(SAMPLE_PLAYLIST_TEXT);
  });

  it("needs a reset before restoring", () => {
    const memento = snapshot(samplePlaylist());

    expect(() => memento.restore(new Playlist())).toThrow(MalformedStreamError);
  });

  it("holds the same bytes as a direct write", () => {
    const value = samplePlaylist();
    const memento = snapshot(value);

    expect(memento.size).toBe(toBytes(value).length);
    expect(memento.toBytes()).toEqual(toBytes(value));
  });

  it("starts where the medium was positioned at capture", () => {
    const value = samplePlaylist();
    const medium = new ByteBuffer();
    medium.write(Uint8Array.of(9, 9, 9));
    const memento = snapshot(value, medium);

    expect(memento.start).toBe(3);
    expect(memento.toBytes()).toEqual(toBytes(value));

    memento.reset();
    expect(medium.position).toBe(3);
    expect(render(memento.restore(new Playlist()))).toBe(SAMPLE_PLAYLIST_TEXT);
  });

  it("restores into a newer version of the type", () => {
    const memento = snapshot(samplePlaylist());
    memento.reset();
    const restored = memento.restore(new PlaylistWithCurator());

    expect(restored.name).toBe("road trip");
    expect(restored.tracks).toHaveLength(2);
    expect(restored.curator).toBeUndefined();
  });

  describe("over a medium that cannot seek", () => {
    it("restores once without a reset", () => {
      const memento = Memento.capture(samplePlaylist(), new Pipe());

      expect(memento.seekable).toBe(false);
      expect(render(memento.restore(new Playlist()))).toBe(SAMPLE_PLAYLIST_TEXT);
    });

    it("refuses to reset", () => {
      const memento = Memento.capture(samplePlaylist(), new Pipe());

      expect(() => memento.reset()).toThrow(NotSeekableError);
      expect(() => memento.reset()).toThrow(
        "Cannot reset memento: the underlying medium is not seekable",
      );
    });

    it("refuses to hand out its bytes", () => {
      const memento = Memento.capture(samplePlaylist(), new Pipe());

      expect(() => memento.toBytes()).toThrow("Cannot copy memento bytes");
    });

    it("fails a second restore on the drained medium", () => {
      const memento = Memento.capture(samplePlaylist(), new Pipe());
      memento.restore(new Playlist());

      expect(() => memento.restore(new Playlist())).toThrow(
        "Unexpected end of stream: needed 1 bytes, got 0",
      );
    });
  });
});
