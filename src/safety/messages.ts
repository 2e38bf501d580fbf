import type { ErrorKind } from '../types/safety.js';

// Shown to children aged 3-8: no mention of what was detected or why
export const CHILD_MESSAGES: Readonly<Record<ErrorKind, string>> = {
  PROMPT_INJECTION: "Hmm, that doesn't look like a name. Let's pick a fun name for your character!",
  INAPPROPRIATE_CONTENT: "Let's choose a kind and friendly name for your character!",
  CHARACTER_RULE_VIOLATION: 'Names can use letters, spaces, dashes and apostrophes. Try a short name!',
  DUPLICATE_SELECTION: 'Oops! You picked the same magic word twice. Choose three different words!',
  UNAPPROVED_SELECTION: 'Please pick your magic words from the word list.',
  INAPPROPRIATE_COMBINATION: "Those magic words don't quite fit together. Let's try a different mix!",
  RATE_LIMITED: "Let's take a little break. You can try again in a few minutes!",
};

export function childMessageFor(kind: ErrorKind): string {
  return CHILD_MESSAGES[kind];
}
