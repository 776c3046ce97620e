import { AlbumNotFoundError } from './errors';

export interface Album {
  id: string;
  title: string;
  rating: number;
}

export type AlbumInput = Omit<Album, 'id'>;

export const seedAlbums: AlbumInput[] = [
  { title: 'Morning Static', rating: 7 },
  { title: 'Harbor Lights', rating: 9 }
];

/** In-memory album storage. Ids are sequential strings starting at "1". */
export class AlbumStore {
  private readonly albums = new Map<string, Album>();
  private nextId = 1;

  constructor(seed: readonly AlbumInput[] = []) {
    for (const input of seed) {
      this.create(input);
    }
  }

  list(): Album[] {
    return Array.from(this.albums.values(), (album) => ({ ...album }));
  }

  get(id: string): Album {
    const album = this.albums.get(id);
    if (!album) {
      throw new AlbumNotFoundError(id);
    }
    return { ...album };
  }

  create(input: AlbumInput): Album {
    const album: Album = { id: String(this.nextId++), title: input.title, rating: input.rating };
    this.albums.set(album.id, album);
    return { ...album };
  }
}
