/**
 * Loads the embedded manifest and builds one gate per tier
 */

import { GateRegistry, parseContentBundle, parseGateManifest } from '@content-gate/shared';
import type { ContentBundle, GateManifest, RegistryOptions } from '@content-gate/shared';

export const MANIFEST_ELEMENT_ID = 'gate-manifest';

/**
 * @returns null when the page embeds no manifest
 * @throws FormatError when the embedded manifest is malformed
 */
export function readEmbeddedManifest(doc: Pick<Document, 'getElementById'>): GateManifest | null {
  const element = doc.getElementById(MANIFEST_ELEMENT_ID);
  if (!element || !element.textContent) {
    return null;
  }
  return parseGateManifest(element.textContent);
}

export function createGateRegistry(
  manifest: GateManifest,
  options: Partial<RegistryOptions<ContentBundle>> = {}
): GateRegistry<ContentBundle> {
  return new GateRegistry<ContentBundle>(manifest, {
    ...options,
    parse: parseContentBundle,
  });
}
