import type { Protocol } from '../core/types.js';
import { Version1 } from './version1.js';
import { Version2 } from './version2.js';

export { Version1 } from './version1.js';
export { Version2 } from './version2.js';

/** Version headers accepted by a parser that is not told otherwise */
export const DEFAULT_ALLOWED_VERSIONS: readonly string[] = Object.freeze([Version1.header, Version2.header]);

/** Built-in suites, keyed by version header */
export const DEFAULT_PROTOCOLS: ReadonlyMap<string, Protocol> = new Map<string, Protocol>([
  [Version1.header, Version1],
  [Version2.header, Version2],
]);

/** Look up a suite by header */
export function getProtocol(header: string, protocols: ReadonlyMap<string, Protocol> = DEFAULT_PROTOCOLS): Protocol | undefined {
  return protocols.get(header);
}
