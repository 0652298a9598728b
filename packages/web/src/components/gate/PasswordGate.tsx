import { useEffect, useState } from 'react';
import type { FormEvent } from 'react';
import { Button, Input } from '../ui';
import { messages } from '../../messages';
import type { GateStore } from '../../stores';

interface PasswordGateProps {
  store: GateStore;
}

export function PasswordGate({ store }: PasswordGateProps) {
  const { submit, touch, isChecking, signal, cooldownSeconds } = store();
  const [password, setPassword] = useState('');
  const isCooling = cooldownSeconds > 0;

  // Countdown; the gate re-checks the clock on every attempt regardless
  useEffect(() => {
    if (!isCooling) return;
    const timer = setInterval(touch, 1000);
    return () => clearInterval(timer);
  }, [isCooling, touch]);

  const handleSubmit = async (e: FormEvent) => {
    e.preventDefault();
    const unlocked = await submit(password);
    if (!unlocked) {
      setPassword('');
    }
  };

  let error: string | undefined;
  if (isCooling) {
    error = messages.cooling(cooldownSeconds);
  } else if (signal?.type === 'incorrect') {
    error = messages.incorrect;
  }

  return (
    <form className="gate-form" onSubmit={handleSubmit}>
      <p className="gate-title">{messages.title}</p>
      <Input
        type="password"
        autoComplete="off"
        value={password}
        onChange={(e) => setPassword(e.target.value)}
        placeholder={messages.placeholder}
        error={error}
        autoFocus
      />
      <Button type="submit" loading={isChecking} disabled={isCooling || !password}>
        {isChecking ? messages.checking : messages.submit}
      </Button>
    </form>
  );
}
