import * as readline from 'readline/promises';

/** Empty answers take the default; anything starting with y is yes. */
export function isYes(answer: string, defaultVal = false): boolean {
  const trimmed = answer.trim().toLowerCase();
  if (!trimmed) return defaultVal;
  return trimmed.startsWith('y');
}

export async function ask(question: string): Promise<string> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    return (await rl.question(question)).trim();
  } finally {
    rl.close();
  }
}

export async function confirm(question: string, defaultVal = false): Promise<boolean> {
  const answer = await ask(`${question} (${defaultVal ? 'Y/n' : 'y/N'}) `);
  return isYes(answer, defaultVal);
}
