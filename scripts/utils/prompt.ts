import readline from 'readline/promises';

const YES = ['y', 'yes', 's', 'sim'];

/**
 * Ask a yes/no question on the terminal; anything but a "yes" answer is a no
 */
export async function confirm(question: string): Promise<boolean> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(`${question} (y/n): `);
    return YES.includes(answer.trim().toLowerCase());
  } finally {
    rl.close();
  }
}
