import type { SqliteBuildStore } from '../store/sqlite-store.js';

export interface RouteOpts {
  store: SqliteBuildStore;
}
