import { parseAllDocuments } from 'yaml';

import { DecodeError, UsageError } from '../kube/errors.js';
import { UnstructuredObject } from '../kube/unstructured.js';
import { documentToTree, isUnstructuredMap } from '../kube/wire.js';

/**
 * Parses multi-document YAML (JSON is a subset) into unstructured objects,
 * keeping field order. Empty documents are skipped.
 */
export function parseManifests(text: string): UnstructuredObject[] {
  const manifests: UnstructuredObject[] = [];

  parseAllDocuments(text, { prettyErrors: false }).forEach((doc, index) => {
    const what = `manifest document ${index + 1}`;
    const [first] = doc.errors;
    if (first) {
      throw new DecodeError(what, first.message, text, first.pos[0], { cause: first });
    }
    const tree = documentToTree(doc, what, text);
    if (tree === null) {
      return;
    }
    if (!isUnstructuredMap(tree)) {
      throw new DecodeError(what, 'expected a mapping');
    }
    manifests.push(normalizeManifest(new UnstructuredObject(tree), what));
  });

  return manifests;
}

function normalizeManifest(manifest: UnstructuredObject, what: string): UnstructuredObject {
  if (!manifest.getApiVersion() || !manifest.getKind()) {
    throw new UsageError(`${what} is missing apiVersion or kind fields`);
  }

  if (!manifest.getName()) {
    throw new UsageError(`${what}: metadata.name is required`);
  }

  return manifest;
}
