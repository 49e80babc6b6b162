import path from 'path';

// Virtual paths are always delimited by a forward slash, regardless of host
export const SEPARATOR = '/';

// Only hosts with a different native separator need virtual paths translated
export const NEEDS_CONVERSION = path.sep !== SEPARATOR;

// Scheme used by canonical identifiers, as in `vfs://default/a/b.txt`
export const SCHEME = 'vfs';

export const CURRENT_SEGMENT = '.';
export const PARENT_SEGMENT = '..';

// Environment variable forcing strict case verification on disk backends
export const ENV_FORCE_CASE_SENSITIVE = 'VFS_FORCE_CASE_SENSITIVE';
