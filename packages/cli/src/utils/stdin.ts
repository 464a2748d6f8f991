import { InvalidInputError } from '@waveplan/shared';
import type { CliIO } from './io';

/**
 * Reads one JSON value from standard input.
 *
 * @param expected - what the command wants, used in the error message
 */
export async function readJsonInput(io: CliIO, expected: string): Promise<unknown> {
  const text = (await io.readStdin()).trim();
  if (!text) {
    throw new InvalidInputError(`No input on stdin (expected ${expected})`);
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new InvalidInputError(`Invalid JSON in stdin (expected ${expected})`, { cause: error });
  }
}
