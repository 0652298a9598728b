import { useEffect } from 'react';
import { Button } from '../ui';
import { messages } from '../../messages';
import { PasswordGate } from './PasswordGate';
import { ProtectedContent } from './ProtectedContent';
import type { GateStore } from '../../stores';

interface GatedSectionProps {
  store: GateStore;
  allowedHosts?: readonly string[];
}

export function GatedSection({ store, allowedHosts }: GatedSectionProps) {
  const { status, content, logout, touch } = store();

  // Session expiry is checked lazily on interaction: page focus, and any
  // pointer or key input inside the unlocked content
  useEffect(() => {
    const onInteraction = () => touch();
    window.addEventListener('focus', onInteraction);
    document.addEventListener('visibilitychange', onInteraction);
    return () => {
      window.removeEventListener('focus', onInteraction);
      document.removeEventListener('visibilitychange', onInteraction);
    };
  }, [touch]);

  if (status === 'unlocked' && content) {
    return (
      <div className="gate-unlocked" onPointerDown={touch} onKeyDown={touch}>
        <ProtectedContent bundle={content} allowedHosts={allowedHosts} />
        <Button variant="secondary" onClick={logout}>
          {messages.logout}
        </Button>
      </div>
    );
  }

  return <PasswordGate store={store} />;
}
