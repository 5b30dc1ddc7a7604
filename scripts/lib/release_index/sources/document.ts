import { isMap, isNode, isScalar, isSeq, parseDocument } from 'yaml';

import { SourceUnavailableError } from '../../errors.js';
import type { RawRelease } from '../types.js';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Reads a `releases` document (YAML or JSON). Releases may be a mapping keyed by version
 * or a list of objects with a `version` field. Repeated keys are kept as separate records
 * so the catalog can reject them instead of the parser silently keeping the last one.
 */
export function rawReleasesFromText(text: string, origin: string): RawRelease[] {
  const doc = parseDocument(text, { uniqueKeys: false });
  if (doc.errors.length > 0) {
    throw new SourceUnavailableError(`${origin} is not valid YAML or JSON: ${doc.errors[0].message}`);
  }

  const root = doc.contents;
  if (!isMap(root)) {
    throw new SourceUnavailableError(`${origin}: expected a top-level mapping with a 'releases' key`);
  }
  if (!root.has('releases')) {
    throw new SourceUnavailableError(`${origin}: expected 'releases' to be set`);
  }

  const toJs = (node: unknown): unknown => (isNode(node) ? node.toJS(doc) : node);
  const releasesNode: unknown = root.get('releases', true);

  if (isMap(releasesNode)) {
    return releasesNode.items.map((pair) => {
      const version = isScalar(pair.key) ? pair.key.value : toJs(pair.key);
      return {
        label: `release '${String(version)}'`,
        version,
        data: toJs(pair.value)
      };
    });
  }

  if (isSeq(releasesNode)) {
    return releasesNode.items.map((item, index) => {
      const data = toJs(item);
      return {
        label: `releases[${index}]`,
        version: isRecord(data) ? data.version : undefined,
        data
      };
    });
  }

  if (releasesNode === null || (isScalar(releasesNode) && releasesNode.value === null)) {
    return [];
  }

  throw new SourceUnavailableError(`${origin}: expected 'releases' to be a mapping or a list`);
}
