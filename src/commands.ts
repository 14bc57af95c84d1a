/**
 * Operator command grammar for a duplicate group.
 */

export type OperatorCommand =
  | { type: 'delete'; indices: number[] }
  | { type: 'keep'; note?: string }
  | { type: 'open'; index: number }
  | { type: 'skip' }
  | { type: 'quit' }
  | { type: 'invalid'; reason: string };

export const COMMAND_HELP = [
  '  <numbers>   Delete those instances (e.g. "1 3")',
  '  c [note]    Keep all copies and mark the file processed',
  '  o <#>       Open an instance for inspection',
  '  s           Skip this file for now',
  '  q           Quit and sync the tracking store'
];

const POSITIVE_INT = /^[1-9]\d*$/;

export function parseCommand(raw: string): OperatorCommand {
  const input = raw.trim();
  if (!input) {
    return { type: 'invalid', reason: 'Enter a command.' };
  }

  const [head, ...rest] = input.split(/\s+/);
  const keyword = head.toLowerCase();

  if (keyword === 'c') {
    const note = input.slice(head.length).trim();
    return note ? { type: 'keep', note } : { type: 'keep' };
  }
  if (keyword === 's' || keyword === 'q') {
    if (rest.length > 0) {
      return { type: 'invalid', reason: `"${keyword}" takes no arguments.` };
    }
    return keyword === 's' ? { type: 'skip' } : { type: 'quit' };
  }
  if (keyword === 'o') {
    if (rest.length !== 1 || !POSITIVE_INT.test(rest[0])) {
      return { type: 'invalid', reason: 'Usage: o <number>' };
    }
    return { type: 'open', index: Number(rest[0]) };
  }

  const tokens = input.split(/[\s,]+/).filter(Boolean);
  if (!tokens.every(token => POSITIVE_INT.test(token))) {
    return { type: 'invalid', reason: `Unrecognised command "${input}".` };
  }

  const indices: number[] = [];
  for (const token of tokens) {
    const index = Number(token);
    if (!indices.includes(index)) indices.push(index);
  }
  return { type: 'delete', indices };
}

/**
 * Out-of-range indices for a group of `count` instances.
 */
export function outOfRange(indices: readonly number[], count: number): number[] {
  return indices.filter(index => index < 1 || index > count);
}

export function isConfirmation(answer: string | null): boolean {
  if (answer === null) return false;
  const normalized = answer.trim().toLowerCase();
  return normalized === 'y' || normalized === 'yes';
}
