// Shared listing types (used by the server's directory listing and any browsing client)

export type EntryKind = 'file' | 'directory';

export interface DirectoryEntry {
  name: string;
  kind: EntryKind;
  size: number;
  /** Seconds since last modification (0 when unknown) */
  ageSeconds: number;
}

/** Presentation-agnostic payload for a directory request */
export interface DirectoryListing {
  /** Request path of the directory, always starting with `/` */
  path: string;
  /** Request path of the parent directory, `null` at the shared root */
  parent: string | null;
  entries: DirectoryEntry[];
}
