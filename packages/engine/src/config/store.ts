export type StoreScope = 'local' | 'global';

export const STORE_SCOPES: readonly StoreScope[] = ['local', 'global'];

/** Scoped key/value source. Multi-valued keys keep insertion order and duplicates. */
export interface ConfigStore {
  getScoped(key: string, scope: StoreScope): Promise<string | undefined>;
  getAllScoped(key: string, scope: StoreScope): Promise<string[]>;
}
