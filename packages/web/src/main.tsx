import { createRoot } from 'react-dom/client';
import type { GateManifest } from '@content-gate/shared';
import { GatedSection } from './components/gate';
import { createGateRegistry, readEmbeddedManifest } from './services';
import { createGateStore } from './stores';

/**
 * Mount a gate on every `[data-gate-tier]` element of the page.
 * Unprotected parts of the page are left alone, even when the manifest
 * cannot be read.
 */
export function mountGates(doc: Document = document): void {
  let manifest: GateManifest | null;
  try {
    manifest = readEmbeddedManifest(doc);
  } catch (error) {
    console.error('[gate] Embedded manifest is unreadable:', error instanceof Error ? error.message : error);
    return;
  }
  if (!manifest) return;

  const registry = createGateRegistry(manifest);

  doc.querySelectorAll<HTMLElement>('[data-gate-tier]').forEach((element) => {
    const gate = registry.get(element.dataset.gateTier ?? '');
    if (!gate) return;
    createRoot(element).render(<GatedSection store={createGateStore(gate)} />);
  });

  window.addEventListener('pagehide', () => registry.dispose());
}

mountGates();
