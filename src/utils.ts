import type { Readable } from 'stream';
import * as errors from './errors';
import * as constants from './constants';

function never(message: string): never {
  throw new errors.ErrorVFSUndefinedBehaviour(message);
}

/**
 * Narrows by shape, since errors thrown by Node's core modules may come from
 * another realm and fail `instanceof Error`.
 */
function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return typeof e === 'object' && e != null && 'code' in e;
}

/**
 * Splits a `/`-delimited path into its non-empty segments. Dot segments are
 * kept so that traversal can interpret them.
 */
function splitPath(path: string): Array<string> {
  return path
    .split(constants.SEPARATOR)
    .filter((segment) => segment.length > 0);
}

/**
 * Checks if `child` is `parent` itself or lies beneath it, using `separator`
 * to delimit segments. This avoids `/a/bc` being treated as under `/a/b`.
 */
function isPathUnder(
  child: string,
  parent: string,
  separator: string = constants.SEPARATOR,
): boolean {
  if (child === parent) return true;
  const prefix = parent.endsWith(separator) ? parent : parent + separator;
  return child.startsWith(prefix);
}

/**
 * Returns the portion of `child` after `parent` without a leading separator.
 * The caller must have checked {@link isPathUnder} first.
 */
function relativePath(
  child: string,
  parent: string,
  separator: string = constants.SEPARATOR,
): string {
  const rest = child.slice(parent.length);
  return rest.startsWith(separator) ? rest.slice(separator.length) : rest;
}

function encodePath(pathName: string): string {
  return pathName
    .split(constants.SEPARATOR)
    .map((segment) => encodeURIComponent(segment))
    .join(constants.SEPARATOR);
}

function decodePath(encoded: string): string {
  try {
    return encoded
      .split(constants.SEPARATOR)
      .map((segment) => decodeURIComponent(segment))
      .join(constants.SEPARATOR);
  } catch (e) {
    throw new errors.ErrorVFSInvalidPath(`Malformed path encoding ${encoded}`, {
      cause: e,
    });
  }
}

/**
 * Normalises an identifier into the form used as a cache key, which is
 * `scheme://authority/path` with no query, fragment or trailing slash. The
 * root path keeps its slash.
 */
function canonicalIdentifier(identifier: string | URL): string {
  let url: URL;
  try {
    url = typeof identifier === 'string' ? new URL(identifier) : identifier;
  } catch (e) {
    throw new errors.ErrorVFSInvalidPath(
      `Identifier ${identifier} is not a valid URL`,
      { cause: e },
    );
  }
  let pathName = url.pathname === '' ? constants.SEPARATOR : url.pathname;
  if (pathName.length > 1 && pathName.endsWith(constants.SEPARATOR)) {
    pathName = pathName.slice(0, -1);
  }
  return `${url.protocol}//${url.host}${pathName}`;
}

function concatUint8Arrays(...arrays: Array<Uint8Array>): Uint8Array {
  const totalLength = arrays.reduce((acc, arr) => acc + arr.length, 0);
  const result = new Uint8Array(totalLength);
  let offset = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }
  return result;
}

/**
 * Drains a byte stream into a single buffer.
 */
async function readStream(stream: Readable): Promise<Uint8Array> {
  const encoder = new TextEncoder();
  const chunks: Array<Uint8Array> = [];
  for await (const chunk of stream) {
    if (chunk instanceof Uint8Array) {
      chunks.push(chunk);
    } else if (typeof chunk === 'string') {
      chunks.push(encoder.encode(chunk));
    } else {
      never(`Unexpected chunk of type ${typeof chunk} in byte stream`);
    }
  }
  return concatUint8Arrays(...chunks);
}

export {
  never,
  isErrnoException,
  splitPath,
  isPathUnder,
  relativePath,
  encodePath,
  decodePath,
  canonicalIdentifier,
  concatUint8Arrays,
  readStream,
};
