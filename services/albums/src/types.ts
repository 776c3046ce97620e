import type { AlbumsConfig } from './config';
import type { AlbumStore } from './store';

export interface AppContext {
  config: AlbumsConfig;
  store: AlbumStore;
}
