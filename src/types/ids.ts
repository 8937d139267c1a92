/** Slash-separated path relative to the tree directory, e.g. `if-archive/games/advent.z5`. */
export type ArchivePath = string;

/** Seconds since the epoch. */
export type EpochSeconds = number;
