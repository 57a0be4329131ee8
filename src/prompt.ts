/**
 * Minimal interactive prompts on stdin/stdout
 */

import { createInterface } from 'readline/promises';
import { InputClosedError } from './errors.js';

export interface PromptStreams {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

const stdio = (): PromptStreams => ({ input: process.stdin, output: process.stdout });

/**
 * Ask one question. Rejects with InputClosedError when input ends first
 * (piped stdin, Ctrl-D).
 */
export async function ask(question: string, streams: PromptStreams = stdio()): Promise<string> {
  const rl = createInterface(streams);
  let answered = false;
  const closed = new Promise<never>((_, reject) => {
    rl.once('close', () => {
      if (!answered) reject(new InputClosedError('Input closed before an answer was given'));
    });
  });

  try {
    const answer = await Promise.race([rl.question(question), closed]);
    answered = true;
    return answer.trim();
  } finally {
    answered = true;
    rl.close();
  }
}

export async function confirm(
  question: string,
  defaultValue: boolean,
  streams?: PromptStreams,
): Promise<boolean> {
  const hint = defaultValue ? '[Y/n]' : '[y/N]';
  const answer = (await ask(`${question} ${hint} `, streams)).toLowerCase();
  if (!answer) return defaultValue;
  return answer === 'y' || answer === 'yes';
}

/**
 * Ask until the answer is one of `choices`
 */
export async function choose<T extends string>(
  question: string,
  choices: readonly T[],
  streams?: PromptStreams,
): Promise<T> {
  for (;;) {
    const answer = await ask(`${question} (${choices.join('/')}): `, streams);
    const match = choices.find(c => c === answer);
    if (match) return match;
    console.log(`Please enter one of: ${choices.join(', ')}`);
  }
}

/**
 * Ask for a number between 1 and max (inclusive)
 */
export async function chooseIndex(question: string, max: number, streams?: PromptStreams): Promise<number> {
  for (;;) {
    const answer = Number(await ask(`${question} [1-${max}]: `, streams));
    if (Number.isInteger(answer) && answer >= 1 && answer <= max) return answer;
    console.log(`Please enter a number between 1 and ${max}.`);
  }
}
