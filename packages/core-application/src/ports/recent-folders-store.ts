export interface RecentFoldersStore {
  list(): Promise<string[]>;
  add(folder: string): Promise<void>;
}
