export enum EntryKind {
  DIR = 'DIR',
  FILE = 'FILE',
  SYMLINK = 'SYMLINK',
  SPECIAL = 'SPECIAL'
}

export enum SectionKind {
  DIRECTORY = 'directory',
  FILE = 'file'
}

export enum ErrorStage {
  STAT = 'STAT',
  LIST = 'LIST',
  READ = 'READ',
  READLINK = 'READLINK'
}

export enum ErrorCode {
  NOT_FOUND = 'NOT_FOUND',
  PERMISSION_DENIED = 'PERMISSION_DENIED',
  PATH_TOO_LONG = 'PATH_TOO_LONG',
  IO_ERROR = 'IO_ERROR',
  UNKNOWN = 'UNKNOWN'
}
