export { GatedSection } from './GatedSection';
export { PasswordGate } from './PasswordGate';
export { ProtectedContent } from './ProtectedContent';
