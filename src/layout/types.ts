// === Directory roles ===

export type DirectoryRole =
  | 'Features'
  | 'Interactions'
  | 'Pages'
  | 'Steps';

/** Fixed processing and reporting order. */
export const DIRECTORY_ROLES: readonly DirectoryRole[] = [
  'Features',
  'Interactions',
  'Pages',
  'Steps',
] as const;

// === Layout ===

export interface Subdirectory {
  readonly path: string;
  readonly role: DirectoryRole;
}

export interface ProjectLayout {
  /** Lowercased feature name. */
  readonly feature: string;
  /** One entry per role, in DIRECTORY_ROLES order. */
  readonly subdirectories: readonly Subdirectory[];
}

export type PathSegments = Readonly<Record<DirectoryRole, string>>;
