import { isScalarList } from "../scalar.js";
import type { Loadable, Part, PartFormatter, PartReader, Scalar } from "../types.js";

// ============================================================================
// Version 1 of a small tree: a playlist owning tracks
// ============================================================================

export class Track implements Loadable {
  readonly schemaVersion = 1;
  title?: string;

  constructor(title?: string) {
    this.title = title;
  }

  *describe(formatter: PartFormatter): Iterable<Part> {
    yield formatter.format("Title", this.title);
  }

  load(reader: PartReader): void {
    this.title = reader.readString("Title") ?? undefined;
  }
}

export class Playlist implements Loadable {
  readonly schemaVersion: number = 1;
  name?: string;
  featured?: Track;
  tracks: Track[] = [];

  *describe(formatter: PartFormatter): Iterable<Part> {
    yield formatter.format("Name", this.name);
    yield formatter.format("Featured", this.featured);
    yield formatter.format("Tracks", this.tracks);
  }

  load(reader: PartReader): void {
    this.name = reader.readString("Name") ?? undefined;
    this.featured = reader.readObject(Track, "Featured");
    this.tracks = reader.readList(Track, "Tracks");
  }
}

export function samplePlaylist(): Playlist {
  const playlist = new Playlist();
  playlist.name = "road trip";
  playlist.featured = new Track("opening theme");
  playlist.tracks = [new Track("first song"), new Track("second song")];
  return playlist;
}

export const SAMPLE_PLAYLIST_TEXT = [
  "Playlist (object)",
  "\tName: road trip",
  "\tFeatured: ",
  "\t\tTrack (object)",
  "\t\t\tTitle: opening theme",
  "\tTracks: (list)",
  "\t\tTrack (object)",
  "\t\t\tTitle: first song",
  "\t\tTrack (object)",
  "\t\t\tTitle: second song",
  "",
].join("\n");

// ============================================================================
// Later versions of Playlist, all writing the same type name
// ============================================================================

/** v2 appends a Curator part. */
export class PlaylistWithCurator implements Loadable {
  readonly schemaVersion = 2;
  readonly typeName = "Playlist";
  name?: string;
  featured?: Track;
  tracks: Track[] = [];
  curator?: string;

  *describe(formatter: PartFormatter): Iterable<Part> {
    yield formatter.format("Name", this.name);
    yield formatter.format("Featured", this.featured);
    yield formatter.format("Tracks", this.tracks);
    yield formatter.format("Curator", this.curator);
  }

  load(reader: PartReader, storedVersion: number): void {
    this.name = reader.readString("Name") ?? undefined;
    this.featured = reader.readObject(Track, "Featured");
    this.tracks = reader.readList(Track, "Tracks");
    if (storedVersion >= 2) {
      this.curator = reader.readString("Curator") ?? undefined;
    }
  }
}

/** v2 drops Featured; the stored value is read and discarded. */
export class PlaylistWithoutFeatured implements Loadable {
  readonly schemaVersion = 2;
  readonly typeName = "Playlist";
  name?: string;
  tracks: Track[] = [];

  *describe(formatter: PartFormatter): Iterable<Part> {
    yield formatter.format("Name", this.name);
    yield formatter.format("Tracks", this.tracks);
  }

  load(reader: PartReader, storedVersion: number): void {
    this.name = reader.readString("Name") ?? undefined;
    if (storedVersion < 2) {
      reader.readObject(Track, "Featured");
    }
    this.tracks = reader.readList(Track, "Tracks");
  }
}

/** Same as PlaylistWithoutFeatured, but skips the old part without naming its type. */
export class PlaylistSkippingFeatured extends PlaylistWithoutFeatured {
  override load(reader: PartReader, storedVersion: number): void {
    this.name = reader.readString("Name") ?? undefined;
    if (storedVersion < 2) {
      reader.skip();
    }
    this.tracks = reader.readList(Track, "Tracks");
  }
}

/** v2 replaces the textual Name with a numeric Rank. */
export class RankedPlaylist implements Loadable {
  readonly schemaVersion = 2;
  readonly typeName = "Playlist";
  rank?: number;
  featured?: Track;
  tracks: Track[] = [];

  *describe(formatter: PartFormatter): Iterable<Part> {
    yield formatter.format("Rank", this.rank);
    yield formatter.format("Featured", this.featured);
    yield formatter.format("Tracks", this.tracks);
  }

  load(reader: PartReader, storedVersion: number): void {
    if (storedVersion < 2) {
      const oldName = reader.readString("Name");
      this.rank = oldName != null && /^-?\d+$/.test(oldName) ? Number(oldName) : undefined;
    } else {
      this.rank = reader.readNumber("Rank") ?? undefined;
    }
    this.featured = reader.readObject(Track, "Featured");
    this.tracks = reader.readList(Track, "Tracks");
  }
}

/** v2 of Track adds an Artist part. */
export class TrackWithArtist implements Loadable {
  readonly schemaVersion = 2;
  readonly typeName = "Track";
  title?: string;
  artist?: string;

  *describe(formatter: PartFormatter): Iterable<Part> {
    yield formatter.format("Title", this.title);
    yield formatter.format("Artist", this.artist);
  }

  load(reader: PartReader, storedVersion: number): void {
    this.title = reader.readString("Title") ?? undefined;
    if (storedVersion >= 2) {
      this.artist = reader.readString("Artist") ?? undefined;
    }
  }
}

/** Playlist v1 layout whose children are read with the newer Track. */
export class PlaylistOfArtistTracks implements Loadable {
  readonly schemaVersion = 1;
  readonly typeName = "Playlist";
  name?: string;
  featured?: TrackWithArtist;
  tracks: TrackWithArtist[] = [];

  *describe(formatter: PartFormatter): Iterable<Part> {
    yield formatter.format("Name", this.name);
    yield formatter.format("Featured", this.featured);
    yield formatter.format("Tracks", this.tracks);
  }

  load(reader: PartReader): void {
    this.name = reader.readString("Name") ?? undefined;
    this.featured = reader.readObject(TrackWithArtist, "Featured");
    this.tracks = reader.readList(TrackWithArtist, "Tracks");
  }
}

// ============================================================================
// Siblings of different types and versions under one parent
// ============================================================================

export class Artwork implements Loadable {
  readonly schemaVersion = 2;
  uri?: string;
  width = 0;

  *describe(formatter: PartFormatter): Iterable<Part> {
    yield formatter.format("Uri", this.uri);
    yield formatter.format("Width", this.width);
  }

  load(reader: PartReader, storedVersion: number): void {
    this.uri = reader.readString("Uri") ?? undefined;
    this.width = storedVersion >= 2 ? (reader.readNumber("Width") ?? 0) : 0;
  }
}

export class Credits implements Loadable {
  readonly schemaVersion = 1;
  names: string[] = [];

  *describe(formatter: PartFormatter): Iterable<Part> {
    yield formatter.format("Names", this.names);
  }

  load(reader: PartReader): void {
    this.names = reader
      .readScalarList("Names")
      .filter((name): name is string => typeof name === "string");
  }
}

export class Album implements Loadable {
  readonly schemaVersion = 3;
  cover?: Artwork;
  credits?: Credits;

  *describe(formatter: PartFormatter): Iterable<Part> {
    yield formatter.format("Cover", this.cover);
    yield formatter.format("Credits", this.credits);
  }

  load(reader: PartReader): void {
    this.cover = reader.readObject(Artwork, "Cover");
    this.credits = reader.readObject(Credits, "Credits");
  }
}

/** A list of tracks with gaps left as null items. */
export class Queue implements Loadable {
  readonly schemaVersion = 1;
  items: Array<Track | null> = [];

  *describe(formatter: PartFormatter): Iterable<Part> {
    yield formatter.format("Items", this.items);
  }

  load(reader: PartReader): void {
    this.items = reader
      .readMixedList(Track, "Items")
      .map((item) => (item instanceof Track ? item : null));
  }
}

// ============================================================================
// Every scalar encoding
// ============================================================================

function toNumberRow(row: Scalar): number[] {
  return isScalarList(row) ? row.filter((v): v is number => typeof v === "number") : [];
}

export class Reading implements Loadable {
  readonly schemaVersion = 1;
  count = 0;
  ratio = 0;
  signed = 0n;
  unsigned = 0n;
  flag = false;
  label = "";
  takenAt = new Date(0);
  payload: Uint8Array = new Uint8Array();
  unset: string | undefined = "placeholder";
  cleared: string | null = "placeholder";
  matrix: number[][] = [];
  tags: string[] = [];

  *describe(formatter: PartFormatter): Iterable<Part> {
    yield formatter.format("Count", this.count);
    yield formatter.format("Ratio", this.ratio);
    yield formatter.format("Signed", this.signed);
    yield formatter.format("Unsigned", this.unsigned);
    yield formatter.format("Flag", this.flag);
    yield formatter.format("Label", this.label);
    yield formatter.format("TakenAt", this.takenAt);
    yield formatter.format("Payload", this.payload);
    yield formatter.format("Unset", this.unset);
    yield formatter.format("Cleared", this.cleared);
    yield formatter.format("Matrix", this.matrix);
    yield formatter.format("Tags", this.tags);
  }

  load(reader: PartReader): void {
    this.count = reader.readNumber("Count") ?? 0;
    this.ratio = reader.readNumber("Ratio") ?? 0;
    this.signed = reader.readBigInt("Signed") ?? 0n;
    this.unsigned = reader.readBigInt("Unsigned") ?? 0n;
    this.flag = reader.readBoolean("Flag") ?? false;
    this.label = reader.readString("Label") ?? "";
    this.takenAt = reader.readDate("TakenAt") ?? new Date(0);
    this.payload = reader.readBytes("Payload") ?? new Uint8Array();
    this.unset = reader.readString("Unset") ?? undefined;
    this.cleared = reader.readString("Cleared") ?? null;
    this.matrix = reader.readScalarList("Matrix").map(toNumberRow);
    this.tags = reader.readScalarList("Tags").filter((t): t is string => typeof t === "string");
  }
}

export function sampleReading(): Reading {
  const reading = new Reading();
  reading.count = -2147483648;
  reading.ratio = 2.5;
  reading.signed = -(2n ** 63n);
  reading.unsigned = 2n ** 64n - 1n;
  reading.flag = true;
  reading.label = "größe ✓";
  reading.takenAt = new Date(Date.UTC(2024, 0, 2, 3, 4, 5));
  reading.payload = new Uint8Array([0, 127, 255]);
  reading.unset = undefined;
  reading.cleared = null;
  reading.matrix = [[1, 2], [], [3.5]];
  reading.tags = ["alpha", "beta", "gamma"];
  return reading;
}

// ============================================================================
// Polymorphic lists resolved through a type registry
// ============================================================================

export class Circle implements Loadable {
  readonly schemaVersion = 1;
  radius = 0;

  *describe(formatter: PartFormatter): Iterable<Part> {
    yield formatter.format("Radius", this.radius);
  }

  load(reader: PartReader): void {
    this.radius = reader.readNumber("Radius") ?? 0;
  }
}

export class Square implements Loadable {
  readonly schemaVersion = 1;
  side = 0;

  *describe(formatter: PartFormatter): Iterable<Part> {
    yield formatter.format("Side", this.side);
  }

  load(reader: PartReader): void {
    this.side = reader.readNumber("Side") ?? 0;
  }
}

export class Drawing implements Loadable {
  readonly schemaVersion = 1;
  shapes: Loadable[] = [];
  highlight?: Loadable;

  *describe(formatter: PartFormatter): Iterable<Part> {
    yield formatter.format("Shapes", this.shapes);
    yield formatter.format("Highlight", this.highlight);
  }

  load(reader: PartReader): void {
    this.shapes = reader.readList("Shapes");
    this.highlight = reader.readObject("Highlight");
  }
}

export function circle(radius: number): Circle {
  const shape = new Circle();
  shape.radius = radius;
  return shape;
}

export function square(side: number): Square {
  const shape = new Square();
  shape.side = side;
  return shape;
}
