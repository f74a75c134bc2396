import readline from "node:readline/promises";

/** Leading y or Y means yes. */
export function isAffirmative(answer: string): boolean {
  return /^[Yy]/.test(answer.trim());
}

export async function askForConfirmation(question: string): Promise<boolean> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    return isAffirmative(await rl.question(question));
  } finally {
    rl.close();
  }
}
