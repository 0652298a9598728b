export { createGateRegistry, readEmbeddedManifest, MANIFEST_ELEMENT_ID } from './gate-service';
