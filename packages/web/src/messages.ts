export const messages = {
  title: 'This section is password-protected.',
  placeholder: 'Enter password',
  submit: 'Enter',
  checking: 'Checking...',
  incorrect: 'Wrong password. Try again.',
  cooling: (seconds: number) => `Too many attempts. Wait ${seconds}s...`,
  logout: 'Lock',
  blockedLink: 'link unavailable',
};
